import { Db, insertedId } from "../../shared/db/database";
import { assignments, Filters, SqlValue } from "../../shared/db/query";
import { ApiError, notFound } from "../../shared/http/api-error";
import { fieldError } from "../../shared/validation/fields";
import { PersonnelService } from "../personnel/personnel.service";
import { ProductionService } from "../productions/production.service";
import { CreateHarvestInput, UpdateHarvestInput } from "./harvest.dto";

export type Harvest = {
  id: number;
  productionId: number | null;
  harvestDate: string;
  plot: string;
  quantity: number;
  personnelId: number;
  personnelName: string;
  deliveredTo: string | null;
  notes: string;
  greenhouse: string | null;
  crop: string | null;
  createdAt: string;
};

export type HarvestListOptions = {
  from?: string;
  to?: string;
  personnelId?: number;
  productionId?: number;
};

const SELECT_HARVEST = `
  SELECT h.id, h.production_id AS productionId, h.harvest_date AS harvestDate, h.plot, h.quantity,
         h.personnel_id AS personnelId, p.name AS personnelName, h.delivered_to AS deliveredTo, h.notes,
         u.greenhouse, u.crop, h.created_at AS createdAt
    FROM harvests h
    JOIN personnel p ON p.id = h.personnel_id
    LEFT JOIN productions u ON u.id = h.production_id`;

export class HarvestService {
  private readonly personnel: PersonnelService;
  private readonly productions: ProductionService;

  constructor(private readonly db: Db) {
    this.personnel = new PersonnelService(db);
    this.productions = new ProductionService(db);
  }

  list(opts: HarvestListOptions = {}): Harvest[] {
    const filters = new Filters();
    if (opts.from) filters.add("h.harvest_date >= ?", opts.from);
    if (opts.to) filters.add("h.harvest_date <= ?", opts.to);
    if (opts.personnelId) filters.add("h.personnel_id = ?", opts.personnelId);
    if (opts.productionId) filters.add("h.production_id = ?", opts.productionId);

    return this.db
      .prepare<SqlValue[], Harvest>(`${SELECT_HARVEST} ${filters.toSql()} ORDER BY h.harvest_date DESC, h.id DESC`)
      .all(...filters.params);
  }

  get(id: number): Harvest {
    const harvest = this.db.prepare<[number], Harvest>(`${SELECT_HARVEST} WHERE h.id = ?`).get(id);
    if (!harvest) {
      throw notFound("Hasat kaydı");
    }
    return harvest;
  }

  create(input: CreateHarvestInput): Harvest {
    return this.db.transaction(() => {
      this.personnel.assertExists(input.personnelId);
      this.assertProductionFits(input.productionId ?? null, input.harvestDate);

      const result = this.db
        .prepare<SqlValue[]>(
          `INSERT INTO harvests (production_id, harvest_date, plot, quantity, personnel_id, delivered_to, notes)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.productionId ?? null,
          input.harvestDate,
          input.plot,
          input.quantity,
          input.personnelId,
          input.deliveredTo ?? null,
          input.notes ?? "",
        );
      return this.get(insertedId(result.lastInsertRowid));
    })();
  }

  update(id: number, input: UpdateHarvestInput): Harvest {
    return this.db.transaction(() => {
      const existing = this.get(id);

      if (input.personnelId !== undefined) {
        this.personnel.assertExists(input.personnelId);
      }
      this.assertProductionFits(
        input.productionId === undefined ? existing.productionId : input.productionId,
        input.harvestDate ?? existing.harvestDate,
      );

      const set = assignments({
        production_id: input.productionId,
        harvest_date: input.harvestDate,
        plot: input.plot,
        quantity: input.quantity,
        personnel_id: input.personnelId,
        delivered_to: input.deliveredTo,
        notes: input.notes,
      });

      if (set.sql) {
        this.db.prepare<SqlValue[]>(`UPDATE harvests SET ${set.sql} WHERE id = ?`).run(...set.params, id);
      }

      return this.get(id);
    })();
  }

  remove(id: number): void {
    this.db.transaction(() => {
      this.get(id);
      this.db.prepare<[number]>("DELETE FROM harvests WHERE id = ?").run(id);
    })();
  }

  private assertProductionFits(productionId: number | null, harvestDate: string): void {
    if (productionId === null) return;

    const production = this.productions.find(productionId);
    if (!production) {
      throw new ApiError(400, "Geçersiz üretim kaydı seçimi");
    }
    if (harvestDate < production.plantingDate) {
      throw fieldError("harvestDate", "Hasat tarihi üretimin ekim tarihinden önce olamaz");
    }
  }
}
