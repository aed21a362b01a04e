import { Db, insertedId } from "../../shared/db/database";
import { assignments, Filters, SqlValue } from "../../shared/db/query";
import { today } from "../../shared/dates";
import { notFound } from "../../shared/http/api-error";
import { fieldError } from "../../shared/validation/fields";
import { CreateInventoryItemInput, StockMovementInput, UpdateInventoryItemInput } from "./inventory-item.dto";

export type InventoryItem = {
  id: number;
  name: string;
  category: string | null;
  quantity: number;
  unit: string | null;
  date: string;
  warehouse: string | null;
  minStock: number;
  unitCost: number;
  notes: string;
  lowStock: boolean;
};

type InventoryItemRow = Omit<InventoryItem, "lowStock">;

export type InventoryListOptions = {
  category?: string;
  lowStock?: boolean;
};

const SELECT_ITEM = `
  SELECT id, name, category, quantity, unit, date, warehouse, min_stock AS minStock,
         unit_cost AS unitCost, notes
    FROM inventory_items`;

// Mirrors LOW_STOCK_SQL; the two must agree.
export const isLowStock = (item: { quantity: number; minStock: number }): boolean => item.quantity < item.minStock;

export const LOW_STOCK_SQL = "quantity < min_stock";

const toItem = (row: InventoryItemRow): InventoryItem => ({ ...row, lowStock: isLowStock(row) });

export class InventoryItemService {
  constructor(private readonly db: Db) {}

  list(opts: InventoryListOptions = {}): InventoryItem[] {
    const filters = new Filters();
    if (opts.category) filters.add("category = ?", opts.category);
    if (opts.lowStock === true) filters.add(LOW_STOCK_SQL);
    if (opts.lowStock === false) filters.add(`NOT (${LOW_STOCK_SQL})`);

    return this.db
      .prepare<SqlValue[], InventoryItemRow>(`${SELECT_ITEM} ${filters.toSql()} ORDER BY name, id`)
      .all(...filters.params)
      .map(toItem);
  }

  recent(limit: number): InventoryItem[] {
    return this.db
      .prepare<[number], InventoryItemRow>(`${SELECT_ITEM} ORDER BY date DESC, id DESC LIMIT ?`)
      .all(limit)
      .map(toItem);
  }

  get(id: number): InventoryItem {
    const row = this.db.prepare<[number], InventoryItemRow>(`${SELECT_ITEM} WHERE id = ?`).get(id);
    if (!row) {
      throw notFound("Stok kaydı");
    }
    return toItem(row);
  }

  create(input: CreateInventoryItemInput, now: Date = new Date()): InventoryItem {
    return this.db.transaction(() => {
      const result = this.db
        .prepare<SqlValue[]>(
          `INSERT INTO inventory_items (name, category, quantity, unit, date, warehouse, min_stock, unit_cost, notes)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.name,
          input.category ?? null,
          input.quantity,
          input.unit ?? null,
          input.date ?? today(now),
          input.warehouse ?? null,
          input.minStock,
          input.unitCost,
          input.notes ?? "",
        );
      return this.get(insertedId(result.lastInsertRowid));
    })();
  }

  update(id: number, input: UpdateInventoryItemInput): InventoryItem {
    return this.db.transaction(() => {
      this.get(id);

      const set = assignments({
        name: input.name,
        category: input.category,
        quantity: input.quantity,
        unit: input.unit,
        date: input.date,
        warehouse: input.warehouse,
        min_stock: input.minStock,
        unit_cost: input.unitCost,
        notes: input.notes,
      });

      if (set.sql) {
        this.db.prepare<SqlValue[]>(`UPDATE inventory_items SET ${set.sql} WHERE id = ?`).run(...set.params, id);
      }

      return this.get(id);
    })();
  }

  /** Adds to or removes from the on-hand quantity; stock never goes negative. */
  move(id: number, movement: StockMovementInput): InventoryItem {
    return this.db.transaction(() => {
      const item = this.get(id);

      const delta = movement.type === "ekle" ? movement.quantity : -movement.quantity;
      const nextQuantity = item.quantity + delta;
      if (nextQuantity < 0) {
        throw fieldError("quantity", `Yetersiz stok! Mevcut miktar: ${item.quantity}`);
      }

      this.db.prepare<[number, number]>("UPDATE inventory_items SET quantity = ? WHERE id = ?").run(nextQuantity, id);

      return this.get(id);
    })();
  }

  remove(id: number): void {
    this.db.transaction(() => {
      this.get(id);
      this.db.prepare<[number]>("DELETE FROM inventory_items WHERE id = ?").run(id);
    })();
  }
}
