import { Db } from "../../shared/db/database";
import { MonthBounds, monthBounds, trailingMonths } from "../../shared/dates";
import { ATTENDANCE_STATUS_KEYS, AttendanceStatus } from "../attendance/attendance.dto";
import { HARVESTED } from "../productions/production.dto";

type AttendanceCounts = Record<(typeof ATTENDANCE_STATUS_KEYS)[AttendanceStatus], number>;

export type MonthlyReport = {
  month: string;
  from: string;
  to: string;
  harvest: {
    totalQuantity: number;
    count: number;
    byPersonnel: { personnelId: number; personnelName: string; count: number; totalQuantity: number }[];
  };
  attendance: AttendanceCounts & {
    total: number;
    byPersonnel: ({ personnelId: number; personnelName: string } & AttendanceCounts)[];
  };
  personnelCost: {
    total: number;
    byPersonnel: { personnelId: number; personnelName: string; monthlySalary: number; payableDays: number; cost: number }[];
  };
  /** Tasks dated in the month, for every active person (zero when none). */
  tasks: {
    total: number;
    byPersonnel: { personnelId: number; personnelName: string; count: number }[];
  };
  production: {
    planted: number;
    harvested: number;
    totalActualYield: number;
    /** Yields of the productions that have both an expected (> 0) and an actual value. */
    comparedActualYield: number;
    comparedExpectedYield: number;
    /** comparedActualYield / comparedExpectedYield, or null when nothing can be compared. */
    yieldRate: number | null;
  };
};

export type OverviewReport = {
  productionByMonth: { month: string; planted: number; harvested: number; totalActualYield: number }[];
  stockByCategory: { category: string; itemCount: number; totalValue: number }[];
  /** Active personnel already employed in each month and their prorated cost. */
  personnelByMonth: { month: string; headcount: number; totalCost: number }[];
};

const round = (value: number, digits = 2): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const emptyCounts = (): AttendanceCounts => ({ present: 0, absent: 0, leave: 0, sick: 0 });

/** Days of the month on or after `startDate`; the whole month when it is unknown. */
export function payableDays(startDate: string | null, month: MonthBounds): number {
  if (!startDate || startDate <= month.start) return month.days;
  if (startDate > month.end) return 0;
  return month.days - Number(startDate.slice(8, 10)) + 1;
}

export function proratedSalary(monthlySalary: number, startDate: string | null, month: MonthBounds): number {
  return round((monthlySalary * payableDays(startDate, month)) / month.days);
}

export class ReportService {
  constructor(private readonly db: Db) {}

  monthly(year: number, month: number): MonthlyReport {
    const bounds = monthBounds(year, month);

    return this.db.transaction(() => ({
      month: bounds.key,
      from: bounds.start,
      to: bounds.end,
      harvest: this.harvestTotals(bounds),
      attendance: this.attendanceTotals(bounds),
      personnelCost: this.personnelCost(bounds),
      tasks: this.taskCounts(bounds),
      production: this.productionTotals(bounds),
    }))();
  }

  overview(now: Date = new Date(), months = 12): OverviewReport {
    const span = trailingMonths(now, months);

    return this.db.transaction(() => {
      const rows = this.db
        .prepare<[string, string, string], { month: string; planted: number; harvested: number; totalActualYield: number }>(
          `SELECT substr(planting_date, 1, 7) AS month,
                  COUNT(*) AS planted,
                  SUM(CASE WHEN status = ? THEN 1 ELSE 0 END) AS harvested,
                  COALESCE(SUM(actual_yield), 0) AS totalActualYield
             FROM productions
            WHERE planting_date BETWEEN ? AND ?
            GROUP BY substr(planting_date, 1, 7)`,
        )
        .all(HARVESTED, span[span.length - 1].start, span[0].end);
      const byMonth = new Map(rows.map((row) => [row.month, row]));

      const stockByCategory = this.db
        .prepare<[], { category: string; itemCount: number; totalValue: number }>(
          `SELECT category, COUNT(*) AS itemCount, COALESCE(SUM(quantity * unit_cost), 0) AS totalValue
             FROM inventory_items
            WHERE category IS NOT NULL AND category != ''
            GROUP BY category
            ORDER BY totalValue DESC, category`,
        )
        .all();

      return {
        productionByMonth: span.map(
          (m) => byMonth.get(m.key) ?? { month: m.key, planted: 0, harvested: 0, totalActualYield: 0 },
        ),
        stockByCategory,
        personnelByMonth: span.map((m) => {
          const cost = this.personnelCost(m);
          return {
            month: m.key,
            headcount: cost.byPersonnel.filter((p) => p.payableDays > 0).length,
            totalCost: cost.total,
          };
        }),
      };
    })();
  }

  private harvestTotals(month: MonthBounds): MonthlyReport["harvest"] {
    const byPersonnel = this.db
      .prepare<[string, string], MonthlyReport["harvest"]["byPersonnel"][number]>(
        `SELECT h.personnel_id AS personnelId, p.name AS personnelName,
                COUNT(*) AS count, SUM(h.quantity) AS totalQuantity
           FROM harvests h
           JOIN personnel p ON p.id = h.personnel_id
          WHERE h.harvest_date BETWEEN ? AND ?
          GROUP BY h.personnel_id, p.name
          ORDER BY totalQuantity DESC, p.name`,
      )
      .all(month.start, month.end);

    return {
      totalQuantity: byPersonnel.reduce((sum, row) => sum + row.totalQuantity, 0),
      count: byPersonnel.reduce((sum, row) => sum + row.count, 0),
      byPersonnel,
    };
  }

  private attendanceTotals(month: MonthBounds): MonthlyReport["attendance"] {
    const rows = this.db
      .prepare<[string, string], { personnelId: number; personnelName: string; status: AttendanceStatus; days: number }>(
        `SELECT d.personnel_id AS personnelId, p.name AS personnelName, d.status, COUNT(*) AS days
           FROM attendance d
           JOIN personnel p ON p.id = d.personnel_id
          WHERE d.date BETWEEN ? AND ?
          GROUP BY d.personnel_id, p.name, d.status
          ORDER BY p.name, d.personnel_id`,
      )
      .all(month.start, month.end);

    const totals = emptyCounts();
    const byPersonnel = new Map<number, { personnelId: number; personnelName: string } & AttendanceCounts>();

    for (const row of rows) {
      const key = ATTENDANCE_STATUS_KEYS[row.status];
      totals[key] += row.days;

      let person = byPersonnel.get(row.personnelId);
      if (!person) {
        person = { personnelId: row.personnelId, personnelName: row.personnelName, ...emptyCounts() };
        byPersonnel.set(row.personnelId, person);
      }
      person[key] += row.days;
    }

    return {
      ...totals,
      total: totals.present + totals.absent + totals.leave + totals.sick,
      byPersonnel: [...byPersonnel.values()],
    };
  }

  private personnelCost(month: MonthBounds): MonthlyReport["personnelCost"] {
    const people = this.db
      .prepare<[], { personnelId: number; personnelName: string; monthlySalary: number; startDate: string | null }>(
        `SELECT id AS personnelId, name AS personnelName, monthly_salary AS monthlySalary, start_date AS startDate
           FROM personnel
          WHERE active = 1
          ORDER BY name, id`,
      )
      .all();

    const byPersonnel = people.map((p) => ({
      personnelId: p.personnelId,
      personnelName: p.personnelName,
      monthlySalary: p.monthlySalary,
      payableDays: payableDays(p.startDate, month),
      cost: proratedSalary(p.monthlySalary, p.startDate, month),
    }));

    return {
      total: round(byPersonnel.reduce((sum, p) => sum + p.cost, 0)),
      byPersonnel,
    };
  }

  private taskCounts(month: MonthBounds): MonthlyReport["tasks"] {
    const byPersonnel = this.db
      .prepare<[string, string], MonthlyReport["tasks"]["byPersonnel"][number]>(
        `SELECT p.id AS personnelId, p.name AS personnelName, COUNT(g.id) AS count
           FROM personnel p
           LEFT JOIN tasks g ON g.personnel_id = p.id AND g.date BETWEEN ? AND ?
          WHERE p.active = 1
          GROUP BY p.id, p.name
          ORDER BY p.name, p.id`,
      )
      .all(month.start, month.end);

    return {
      total: byPersonnel.reduce((sum, row) => sum + row.count, 0),
      byPersonnel,
    };
  }

  private productionTotals(month: MonthBounds): MonthlyReport["production"] {
    const row = this.db
      .prepare<
        [string, string, string],
        { planted: number; harvested: number; totalActualYield: number; ratedActual: number; ratedExpected: number }
      >(
        `SELECT COUNT(*) AS planted,
                COALESCE(SUM(CASE WHEN status = ? THEN 1 ELSE 0 END), 0) AS harvested,
                COALESCE(SUM(actual_yield), 0) AS totalActualYield,
                COALESCE(SUM(CASE WHEN expected_yield > 0 AND actual_yield IS NOT NULL THEN actual_yield END), 0) AS ratedActual,
                COALESCE(SUM(CASE WHEN expected_yield > 0 AND actual_yield IS NOT NULL THEN expected_yield END), 0) AS ratedExpected
           FROM productions
          WHERE planting_date BETWEEN ? AND ?`,
      )
      .get(HARVESTED, month.start, month.end);

    const comparedActualYield = row?.ratedActual ?? 0;
    const comparedExpectedYield = row?.ratedExpected ?? 0;

    return {
      planted: row?.planted ?? 0,
      harvested: row?.harvested ?? 0,
      totalActualYield: row?.totalActualYield ?? 0,
      comparedActualYield,
      comparedExpectedYield,
      yieldRate: comparedExpectedYield > 0 ? round(comparedActualYield / comparedExpectedYield, 4) : null,
    };
  }
}
