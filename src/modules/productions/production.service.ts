import { Db, insertedId } from "../../shared/db/database";
import { assignments, Filters, SqlValue } from "../../shared/db/query";
import { notFound } from "../../shared/http/api-error";
import { fieldError } from "../../shared/validation/fields";
import {
  CreateProductionInput,
  HARVEST_BEFORE_PLANTING,
  HARVESTED,
  harvestsAfterPlanting,
  PLANTING_AFTER_LINKED_HARVEST,
  ProductionStatus,
  UpdateProductionInput,
} from "./production.dto";

export type Production = {
  id: number;
  greenhouse: string;
  crop: string;
  plantingDate: string;
  harvestDate: string | null;
  status: ProductionStatus;
  area: number | null;
  expectedYield: number | null;
  actualYield: number | null;
  notes: string;
  createdAt: string;
};

export type ProductionListOptions = {
  status?: ProductionStatus;
  greenhouse?: string;
  active?: boolean;
  from?: string;
  to?: string;
};

const SELECT_PRODUCTION = `
  SELECT id, greenhouse, crop, planting_date AS plantingDate, harvest_date AS harvestDate, status,
         area, expected_yield AS expectedYield, actual_yield AS actualYield, notes, created_at AS createdAt
    FROM productions`;

export class ProductionService {
  constructor(private readonly db: Db) {}

  list(opts: ProductionListOptions = {}): Production[] {
    const filters = new Filters();
    if (opts.status) filters.add("status = ?", opts.status);
    if (opts.greenhouse) filters.add("greenhouse = ?", opts.greenhouse);
    if (opts.active === true) filters.add("status != ?", HARVESTED);
    if (opts.active === false) filters.add("status = ?", HARVESTED);
    if (opts.from) filters.add("planting_date >= ?", opts.from);
    if (opts.to) filters.add("planting_date <= ?", opts.to);

    return this.db
      .prepare<SqlValue[], Production>(`${SELECT_PRODUCTION} ${filters.toSql()} ORDER BY planting_date DESC, id DESC`)
      .all(...filters.params);
  }

  get(id: number): Production {
    const production = this.db.prepare<[number], Production>(`${SELECT_PRODUCTION} WHERE id = ?`).get(id);
    if (!production) {
      throw notFound("Üretim kaydı");
    }
    return production;
  }

  recent(limit: number): Production[] {
    return this.db
      .prepare<[number], Production>(`${SELECT_PRODUCTION} ORDER BY created_at DESC, id DESC LIMIT ?`)
      .all(limit);
  }

  find(id: number): Production | undefined {
    return this.db.prepare<[number], Production>(`${SELECT_PRODUCTION} WHERE id = ?`).get(id);
  }

  create(input: CreateProductionInput): Production {
    return this.db.transaction(() => {
      const result = this.db
        .prepare<SqlValue[]>(
          `INSERT INTO productions
             (greenhouse, crop, planting_date, harvest_date, status, area, expected_yield, actual_yield, notes)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.greenhouse,
          input.crop,
          input.plantingDate,
          input.harvestDate ?? null,
          input.status ?? "Ekim Yapıldı",
          input.area ?? null,
          input.expectedYield ?? null,
          input.actualYield ?? null,
          input.notes ?? "",
        );
      return this.get(insertedId(result.lastInsertRowid));
    })();
  }

  update(id: number, input: UpdateProductionInput): Production {
    return this.db.transaction(() => {
      const existing = this.get(id);

      const next = {
        plantingDate: input.plantingDate ?? existing.plantingDate,
        harvestDate: input.harvestDate === undefined ? existing.harvestDate : input.harvestDate,
      };
      if (!harvestsAfterPlanting(next)) {
        throw fieldError("harvestDate", HARVEST_BEFORE_PLANTING);
      }
      if (input.plantingDate !== undefined) {
        this.assertLinkedHarvestsFrom(id, input.plantingDate);
      }

      const set = assignments({
        greenhouse: input.greenhouse,
        crop: input.crop,
        planting_date: input.plantingDate,
        harvest_date: input.harvestDate,
        status: input.status,
        area: input.area,
        expected_yield: input.expectedYield,
        actual_yield: input.actualYield,
        notes: input.notes,
      });

      if (set.sql) {
        this.db.prepare<SqlValue[]>(`UPDATE productions SET ${set.sql} WHERE id = ?`).run(...set.params, id);
      }

      return this.get(id);
    })();
  }

  private assertLinkedHarvestsFrom(id: number, plantingDate: string): void {
    const row = this.db
      .prepare<[number], { earliest: string | null }>(
        "SELECT MIN(harvest_date) AS earliest FROM harvests WHERE production_id = ?",
      )
      .get(id);
    if (row?.earliest && row.earliest < plantingDate) {
      throw fieldError("plantingDate", PLANTING_AFTER_LINKED_HARVEST);
    }
  }

  remove(id: number): void {
    this.db.transaction(() => {
      this.get(id);
      // Linked harvests keep their rows; the foreign key sets production_id to NULL.
      this.db.prepare<[number]>("DELETE FROM productions WHERE id = ?").run(id);
    })();
  }
}
