import { Db, insertedId, toBoolean, toFlag } from "../../shared/db/database";
import { assignments, Filters, SqlValue } from "../../shared/db/query";
import { ApiError, notFound } from "../../shared/http/api-error";
import { CreatePersonnelInput, UpdatePersonnelInput } from "./personnel.dto";

export type Personnel = {
  id: number;
  name: string;
  position: string | null;
  monthlySalary: number;
  startDate: string | null;
  active: boolean;
  phone: string | null;
  notes: string;
  createdAt: string;
};

type PersonnelRow = Omit<Personnel, "active"> & { active: number };

const SELECT_PERSONNEL = `
  SELECT id, name, position, monthly_salary AS monthlySalary, start_date AS startDate,
         active, phone, notes, created_at AS createdAt
    FROM personnel`;

const toPersonnel = (row: PersonnelRow): Personnel => ({ ...row, active: toBoolean(row.active) });

export class PersonnelService {
  constructor(private readonly db: Db) {}

  list(opts?: { active?: boolean }): Personnel[] {
    const filters = new Filters();
    if (opts?.active !== undefined) {
      filters.add("active = ?", toFlag(opts.active));
    }

    return this.db
      .prepare<SqlValue[], PersonnelRow>(`${SELECT_PERSONNEL} ${filters.toSql()} ORDER BY active DESC, name`)
      .all(...filters.params)
      .map(toPersonnel);
  }

  get(id: number): Personnel {
    const row = this.db.prepare<[number], PersonnelRow>(`${SELECT_PERSONNEL} WHERE id = ?`).get(id);
    if (!row) {
      throw notFound("Personel");
    }
    return toPersonnel(row);
  }

  /** Throws a 400 when a form references personnel that does not exist. */
  assertExists(id: number): void {
    const row = this.db.prepare<[number], { id: number }>("SELECT id FROM personnel WHERE id = ?").get(id);
    if (!row) {
      throw new ApiError(400, "Geçersiz personel seçimi");
    }
  }

  create(input: CreatePersonnelInput): Personnel {
    return this.db.transaction(() => {
      const result = this.db
        .prepare<SqlValue[]>(
          `INSERT INTO personnel (name, position, monthly_salary, start_date, active, phone, notes)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.name,
          input.position ?? null,
          input.monthlySalary,
          input.startDate ?? null,
          toFlag(input.active ?? true),
          input.phone ?? null,
          input.notes ?? "",
        );
      return this.get(insertedId(result.lastInsertRowid));
    })();
  }

  update(id: number, input: UpdatePersonnelInput): Personnel {
    return this.db.transaction(() => {
      this.get(id);

      const set = assignments({
        name: input.name,
        position: input.position,
        monthly_salary: input.monthlySalary,
        start_date: input.startDate,
        active: input.active === undefined ? undefined : toFlag(input.active),
        phone: input.phone,
        notes: input.notes,
      });

      if (set.sql) {
        this.db.prepare<SqlValue[]>(`UPDATE personnel SET ${set.sql} WHERE id = ?`).run(...set.params, id);
      }

      return this.get(id);
    })();
  }

  remove(id: number): void {
    this.db.transaction(() => {
      this.get(id);

      const refs = this.db
        .prepare<[number, number, number], { count: number }>(
          `SELECT (SELECT COUNT(*) FROM harvests WHERE personnel_id = ?)
                + (SELECT COUNT(*) FROM attendance WHERE personnel_id = ?)
                + (SELECT COUNT(*) FROM tasks WHERE personnel_id = ?) AS count`,
        )
        .get(id, id, id);

      if (refs && refs.count > 0) {
        throw new ApiError(409, "Personelin hasat, devam veya görev kayıtları var; silmek yerine pasif yapın");
      }

      this.db.prepare<[number]>("DELETE FROM personnel WHERE id = ?").run(id);
    })();
  }
}
