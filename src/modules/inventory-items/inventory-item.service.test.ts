import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { ZodError } from "zod";
import { createTestContext } from "../../test/helpers";
import { createInventoryItemSchema, stockMovementSchema } from "./inventory-item.dto";
import { InventoryItemService } from "./inventory-item.service";

const item = (name: string, quantity: number, minStock: number, category = "Gübre") =>
  createInventoryItemSchema.parse({ name, quantity, minStock, category, date: "2026-06-01" });

describe("inventory items", () => {
  test("flag items below their minimum as low stock", () => {
    const service = new InventoryItemService(createTestContext().db);
    const low = service.create(item("Azot", 5, 10));
    const plenty = service.create(item("Fosfor", 15, 10));
    const exact = service.create(item("Potasyum", 10, 10));

    assert.equal(low.lowStock, true);
    assert.equal(plenty.lowStock, false);
    assert.equal(exact.lowStock, false);
    assert.deepEqual(
      service.list({ lowStock: true }).map((i) => i.name),
      ["Azot"],
    );
    assert.deepEqual(
      service.list({ lowStock: false }).map((i) => i.name),
      ["Fosfor", "Potasyum"],
    );
  });

  test("filter by category", () => {
    const service = new InventoryItemService(createTestContext().db);
    service.create(item("Azot", 5, 0, "Gübre"));
    service.create(item("Fungisit", 3, 0, "İlaç"));

    assert.deepEqual(
      service.list({ category: "İlaç" }).map((i) => i.name),
      ["Fungisit"],
    );
  });

  test("date the item today when no date is given", () => {
    const service = new InventoryItemService(createTestContext().db);

    const created = service.create(createInventoryItemSchema.parse({ name: "Tohum", quantity: 1 }), new Date(2026, 5, 3));

    assert.equal(created.date, "2026-06-03");
    assert.equal(created.minStock, 0);
    assert.equal(created.unitCost, 0);
    assert.equal(created.notes, "");
  });

  test("add and remove stock", () => {
    const service = new InventoryItemService(createTestContext().db);
    const created = service.create(item("Azot", 5, 10));

    const added = service.move(created.id, stockMovementSchema.parse({ type: "ekle", quantity: 7 }));
    assert.equal(added.quantity, 12);
    assert.equal(added.lowStock, false);

    const removed = service.move(created.id, { type: "cikar", quantity: 12 });
    assert.equal(removed.quantity, 0);
    assert.equal(removed.lowStock, true);
  });

  test("refuse to remove more than is on hand", () => {
    const service = new InventoryItemService(createTestContext().db);
    const created = service.create(item("Azot", 5, 10));

    assert.throws(
      () => service.move(created.id, { type: "cikar", quantity: 6 }),
      (err: unknown) =>
        err instanceof ZodError &&
        err.issues[0].path.join(".") === "quantity" &&
        err.issues[0].message === "Yetersiz stok! Mevcut miktar: 5",
    );
    assert.equal(service.get(created.id).quantity, 5);
  });

  test("reject movements that are not positive", () => {
    const result = stockMovementSchema.safeParse({ type: "cikar", quantity: 0 });

    assert.equal(result.success, false);
    assert.ok(!result.success);
    assert.equal(result.error.issues[0].message, "Miktar sıfırdan büyük olmalıdır");
  });
});
