import { Db } from "../../shared/db/database";
import { monthOf } from "../../shared/dates";
import { InventoryItem, InventoryItemService, LOW_STOCK_SQL } from "../inventory-items/inventory-item.service";
import { HARVESTED } from "../productions/production.dto";
import { Production, ProductionService } from "../productions/production.service";
import { Task, TaskService } from "../tasks/task.service";

const RECENT_LIMIT = 5;

export type DashboardStats = {
  /** `YYYY-MM` of the month the harvest total covers. */
  month: string;
  activeProductions: number;
  lowStockItems: number;
  monthlyPersonnelCost: number;
  greenhouseCount: number;
  monthHarvestTotal: number;
};

export type DashboardSummary = {
  stats: DashboardStats;
  recentProductions: Production[];
  recentInventory: InventoryItem[];
  recentTasks: Task[];
};

export class DashboardService {
  constructor(private readonly db: Db) {}

  stats(now: Date = new Date()): DashboardStats {
    const month = monthOf(now);

    const row = this.db
      .prepare<[string, string, string], Omit<DashboardStats, "month">>(
        `SELECT
           (SELECT COUNT(*) FROM productions WHERE status != ?) AS activeProductions,
           (SELECT COUNT(*) FROM inventory_items WHERE ${LOW_STOCK_SQL}) AS lowStockItems,
           (SELECT COALESCE(SUM(monthly_salary), 0) FROM personnel WHERE active = 1) AS monthlyPersonnelCost,
           (SELECT COUNT(DISTINCT greenhouse) FROM productions) AS greenhouseCount,
           (SELECT COALESCE(SUM(quantity), 0) FROM harvests WHERE harvest_date BETWEEN ? AND ?) AS monthHarvestTotal`,
      )
      .get(HARVESTED, month.start, month.end);

    return {
      month: month.key,
      activeProductions: row?.activeProductions ?? 0,
      lowStockItems: row?.lowStockItems ?? 0,
      monthlyPersonnelCost: row?.monthlyPersonnelCost ?? 0,
      greenhouseCount: row?.greenhouseCount ?? 0,
      monthHarvestTotal: row?.monthHarvestTotal ?? 0,
    };
  }

  summary(now: Date = new Date()): DashboardSummary {
    return this.db.transaction(() => ({
      stats: this.stats(now),
      recentProductions: new ProductionService(this.db).recent(RECENT_LIMIT),
      recentInventory: new InventoryItemService(this.db).recent(RECENT_LIMIT),
      recentTasks: new TaskService(this.db).list({ limit: RECENT_LIMIT }),
    }))();
  }
}
