import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { monthBounds } from "../../shared/dates";
import type { AppContext } from "../../shared/context";
import { addPersonnel, createTestContext } from "../../test/helpers";
import { AttendanceService } from "../attendance/attendance.service";
import { HarvestService } from "../harvests/harvest.service";
import { createInventoryItemSchema } from "../inventory-items/inventory-item.dto";
import { InventoryItemService } from "../inventory-items/inventory-item.service";
import { ProductionService } from "../productions/production.service";
import { TaskService } from "../tasks/task.service";
import { payableDays, proratedSalary, ReportService } from "./report.service";

const JUNE = monthBounds(2026, 6);

function seed(ctx: AppContext) {
  const ayse = addPersonnel(ctx, { name: "Ayşe", monthlySalary: 30000, startDate: "2026-06-16" });
  const burak = addPersonnel(ctx, { name: "Burak", monthlySalary: 20000 });
  const cem = addPersonnel(ctx, { name: "Cem", monthlySalary: 10000, active: false });
  const deniz = addPersonnel(ctx, { name: "Deniz", monthlySalary: 7000, startDate: "2026-07-01" });

  const harvests = new HarvestService(ctx.db);
  harvests.create({ harvestDate: "2026-05-31", plot: "A1", quantity: 100, personnelId: ayse.id });
  harvests.create({ harvestDate: "2026-06-01", plot: "A1", quantity: 10, personnelId: ayse.id });
  harvests.create({ harvestDate: "2026-06-30", plot: "B1", quantity: 5, personnelId: burak.id });
  harvests.create({ harvestDate: "2026-07-01", plot: "B1", quantity: 50, personnelId: burak.id });

  const attendance = new AttendanceService(ctx.db);
  attendance.create({ personnelId: ayse.id, date: "2026-05-31", status: "Geldi" });
  attendance.create({ personnelId: ayse.id, date: "2026-06-01", status: "Geldi" });
  attendance.create({ personnelId: ayse.id, date: "2026-06-02", status: "İzinli" });
  attendance.create({ personnelId: burak.id, date: "2026-06-01", status: "Rapor" });
  attendance.create({ personnelId: burak.id, date: "2026-06-02", status: "Gelmedi" });

  const productions = new ProductionService(ctx.db);
  const base = { greenhouse: "Sera 1", crop: "Domates" };
  productions.create({ ...base, plantingDate: "2026-06-01", expectedYield: 100, actualYield: 80, status: "Hasat Edildi" });
  productions.create({ ...base, plantingDate: "2026-06-10", expectedYield: 200, actualYield: 250, status: "Hasat Edildi" });
  productions.create({ ...base, plantingDate: "2026-06-20", expectedYield: 50 });
  productions.create({ ...base, plantingDate: "2026-06-30", actualYield: 30 });
  productions.create({ ...base, plantingDate: "2026-05-20" });

  const tasks = new TaskService(ctx.db);
  tasks.create({ personnelId: ayse.id, description: "Budama", date: "2026-06-05" });
  tasks.create({ personnelId: ayse.id, description: "Sulama", date: "2026-06-20" });
  tasks.create({ personnelId: burak.id, description: "İlaçlama", date: "2026-05-31" });
  tasks.create({ personnelId: cem.id, description: "Ambalaj", date: "2026-06-10" });

  return { ayse, burak, deniz };
}

describe("salary proration", () => {
  test("count the days from the start date", () => {
    assert.equal(payableDays(null, JUNE), 30);
    assert.equal(payableDays("2025-01-01", JUNE), 30);
    assert.equal(payableDays("2026-06-16", JUNE), 15);
    assert.equal(payableDays("2026-07-01", JUNE), 0);
    assert.equal(payableDays("2024-02-29", monthBounds(2024, 2)), 1);
  });

  test("round each share to two decimals", () => {
    assert.equal(proratedSalary(1000, "2026-06-02", JUNE), 966.67);
  });
});

describe("monthly report", () => {
  test("total the month's harvests and attendance", () => {
    const ctx = createTestContext();
    const { ayse, burak } = seed(ctx);

    const report = new ReportService(ctx.db).monthly(2026, 6);

    assert.equal(report.month, "2026-06");
    assert.equal(report.from, "2026-06-01");
    assert.equal(report.to, "2026-06-30");
    assert.deepEqual(report.harvest, {
      totalQuantity: 15,
      count: 2,
      byPersonnel: [
        { personnelId: ayse.id, personnelName: "Ayşe", count: 1, totalQuantity: 10 },
        { personnelId: burak.id, personnelName: "Burak", count: 1, totalQuantity: 5 },
      ],
    });
    assert.deepEqual(report.attendance, {
      present: 1,
      absent: 1,
      leave: 1,
      sick: 1,
      total: 4,
      byPersonnel: [
        { personnelId: ayse.id, personnelName: "Ayşe", present: 1, absent: 0, leave: 1, sick: 0 },
        { personnelId: burak.id, personnelName: "Burak", present: 0, absent: 1, leave: 0, sick: 1 },
      ],
    });
  });

  test("prorate the salaries of active personnel", () => {
    const ctx = createTestContext();
    seed(ctx);

    const { personnelCost } = new ReportService(ctx.db).monthly(2026, 6);

    assert.equal(personnelCost.total, 35000);
    assert.deepEqual(
      personnelCost.byPersonnel.map((p) => [p.personnelName, p.payableDays, p.cost]),
      [
        ["Ayşe", 15, 15000],
        ["Burak", 30, 20000],
        ["Deniz", 0, 0],
      ],
    );
  });

  test("count each active person's tasks in the month", () => {
    const ctx = createTestContext();
    const { ayse, burak, deniz } = seed(ctx);

    const { tasks } = new ReportService(ctx.db).monthly(2026, 6);

    assert.deepEqual(tasks, {
      total: 2,
      byPersonnel: [
        { personnelId: ayse.id, personnelName: "Ayşe", count: 2 },
        { personnelId: burak.id, personnelName: "Burak", count: 0 },
        { personnelId: deniz.id, personnelName: "Deniz", count: 0 },
      ],
    });
  });

  test("compare actual and expected yields of the month's plantings", () => {
    const ctx = createTestContext();
    seed(ctx);

    const { production } = new ReportService(ctx.db).monthly(2026, 6);

    assert.deepEqual(production, {
      planted: 4,
      harvested: 2,
      totalActualYield: 360,
      comparedActualYield: 330,
      comparedExpectedYield: 300,
      yieldRate: 1.1,
    });
  });

  test("leave the yield rate empty when nothing can be compared", () => {
    const { production, harvest, personnelCost } = new ReportService(createTestContext().db).monthly(2026, 6);

    assert.equal(production.planted, 0);
    assert.equal(production.yieldRate, null);
    assert.equal(harvest.totalQuantity, 0);
    assert.equal(personnelCost.total, 0);
  });
});

describe("overview report", () => {
  test("fill the trailing months and value stock by category", () => {
    const ctx = createTestContext();
    seed(ctx);
    const inventory = new InventoryItemService(ctx.db);
    inventory.create(createInventoryItemSchema.parse({ name: "Azot", category: "Gübre", quantity: 10, unitCost: 25 }));
    inventory.create(createInventoryItemSchema.parse({ name: "Fosfor", category: "Gübre", quantity: 4, unitCost: 100 }));
    inventory.create(createInventoryItemSchema.parse({ name: "Fungisit", category: "İlaç", quantity: 2, unitCost: 50 }));
    inventory.create(createInventoryItemSchema.parse({ name: "Eldiven", quantity: 100, unitCost: 10 }));

    const overview = new ReportService(ctx.db).overview(new Date(2026, 5, 15), 3);

    assert.deepEqual(overview.productionByMonth, [
      { month: "2026-06", planted: 4, harvested: 2, totalActualYield: 360 },
      { month: "2026-05", planted: 1, harvested: 0, totalActualYield: 0 },
      { month: "2026-04", planted: 0, harvested: 0, totalActualYield: 0 },
    ]);
    assert.deepEqual(overview.stockByCategory, [
      { category: "Gübre", itemCount: 2, totalValue: 650 },
      { category: "İlaç", itemCount: 1, totalValue: 100 },
    ]);
    assert.deepEqual(overview.personnelByMonth, [
      { month: "2026-06", headcount: 2, totalCost: 35000 },
      { month: "2026-05", headcount: 1, totalCost: 20000 },
      { month: "2026-04", headcount: 1, totalCost: 20000 },
    ]);
  });
});
