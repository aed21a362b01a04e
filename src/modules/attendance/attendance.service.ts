import { Db, insertedId } from "../../shared/db/database";
import { assignments, Filters, SqlValue } from "../../shared/db/query";
import { ApiError, notFound } from "../../shared/http/api-error";
import { fieldError } from "../../shared/validation/fields";
import { PersonnelService } from "../personnel/personnel.service";
import {
  AttendanceStatus,
  CreateAttendanceInput,
  DailySheetInput,
  UpdateAttendanceInput,
} from "./attendance.dto";

export type AttendanceRecord = {
  id: number;
  personnelId: number;
  personnelName: string;
  date: string;
  status: AttendanceStatus;
  checkIn: string | null;
  checkOut: string | null;
  notes: string;
  createdAt: string;
};

export type AttendanceListOptions = {
  from?: string;
  to?: string;
  personnelId?: number;
  status?: AttendanceStatus;
  /** Oldest first, as in exports. Newest first by default. */
  chronological?: boolean;
};

export type AttendanceDaySummary = {
  date: string;
  total: number;
  present: number;
  absent: number;
  leave: number;
  sick: number;
};

const SELECT_ATTENDANCE = `
  SELECT d.id, d.personnel_id AS personnelId, p.name AS personnelName, d.date, d.status,
         d.check_in AS checkIn, d.check_out AS checkOut, d.notes, d.created_at AS createdAt
    FROM attendance d
    JOIN personnel p ON p.id = d.personnel_id`;

const DUPLICATE_DAY = "Bu personel için bu tarihte zaten devam kaydı var";

export class AttendanceService {
  private readonly personnel: PersonnelService;

  constructor(private readonly db: Db) {
    this.personnel = new PersonnelService(db);
  }

  list(opts: AttendanceListOptions = {}): AttendanceRecord[] {
    const filters = new Filters();
    if (opts.from) filters.add("d.date >= ?", opts.from);
    if (opts.to) filters.add("d.date <= ?", opts.to);
    if (opts.personnelId) filters.add("d.personnel_id = ?", opts.personnelId);
    if (opts.status) filters.add("d.status = ?", opts.status);

    return this.db
      .prepare<SqlValue[], AttendanceRecord>(
        `${SELECT_ATTENDANCE} ${filters.toSql()} ORDER BY d.date ${opts.chronological ? "ASC" : "DESC"}, p.name`,
      )
      .all(...filters.params);
  }

  /** Status counts per recorded day in the range, newest day first. */
  dailySummary(range: { from: string; to: string }): AttendanceDaySummary[] {
    return this.db
      .prepare<[string, string], AttendanceDaySummary>(
        `SELECT date,
                COUNT(*) AS total,
                SUM(CASE WHEN status = 'Geldi' THEN 1 ELSE 0 END) AS present,
                SUM(CASE WHEN status = 'Gelmedi' THEN 1 ELSE 0 END) AS absent,
                SUM(CASE WHEN status = 'İzinli' THEN 1 ELSE 0 END) AS leave,
                SUM(CASE WHEN status = 'Rapor' THEN 1 ELSE 0 END) AS sick
           FROM attendance
          WHERE date BETWEEN ? AND ?
          GROUP BY date
          ORDER BY date DESC`,
      )
      .all(range.from, range.to);
  }

  get(id: number): AttendanceRecord {
    const record = this.db.prepare<[number], AttendanceRecord>(`${SELECT_ATTENDANCE} WHERE d.id = ?`).get(id);
    if (!record) {
      throw notFound("Devam kaydı");
    }
    return record;
  }

  create(input: CreateAttendanceInput): AttendanceRecord {
    return this.db.transaction(() => {
      this.personnel.assertExists(input.personnelId);

      const duplicate = this.db
        .prepare<[number, string], { id: number }>("SELECT id FROM attendance WHERE personnel_id = ? AND date = ?")
        .get(input.personnelId, input.date);
      if (duplicate) {
        throw new ApiError(409, DUPLICATE_DAY);
      }

      const result = this.db
        .prepare<SqlValue[]>(
          `INSERT INTO attendance (personnel_id, date, status, check_in, check_out, notes)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.personnelId,
          input.date,
          input.status,
          input.checkIn ?? null,
          input.checkOut ?? null,
          input.notes ?? "",
        );
      return this.get(insertedId(result.lastInsertRowid));
    })();
  }

  update(id: number, input: UpdateAttendanceInput): AttendanceRecord {
    return this.db.transaction(() => {
      this.get(id);

      const set = assignments({
        status: input.status,
        check_in: input.checkIn,
        check_out: input.checkOut,
        notes: input.notes,
      });

      if (set.sql) {
        this.db.prepare<SqlValue[]>(`UPDATE attendance SET ${set.sql} WHERE id = ?`).run(...set.params, id);
      }

      return this.get(id);
    })();
  }

  remove(id: number): void {
    this.db.transaction(() => {
      this.get(id);
      this.db.prepare<[number]>("DELETE FROM attendance WHERE id = ?").run(id);
    })();
  }

  /**
   * Records the attendance sheet of one day for every active personnel.
   * Active personnel without an entry are marked absent.
   */
  recordDay(input: DailySheetInput): AttendanceRecord[] {
    return this.db.transaction(() => {
      const active = this.personnel.list({ active: true });
      const activeIds = new Set(active.map((p) => p.id));

      const entries = new Map<number, DailySheetInput["entries"][number]>();
      for (const entry of input.entries) {
        if (!activeIds.has(entry.personnelId)) {
          throw fieldError("entries", `Personel #${entry.personnelId} aktif değil veya bulunamadı`);
        }
        if (entries.has(entry.personnelId)) {
          throw fieldError("entries", `Personel #${entry.personnelId} için birden fazla kayıt gönderildi`);
        }
        entries.set(entry.personnelId, entry);
      }

      const upsert = this.db.prepare<SqlValue[]>(
        `INSERT INTO attendance (personnel_id, date, status, check_in, check_out, notes)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT (personnel_id, date) DO UPDATE SET
           status = excluded.status,
           check_in = excluded.check_in,
           check_out = excluded.check_out,
           notes = excluded.notes`,
      );

      for (const person of active) {
        const entry = entries.get(person.id);
        upsert.run(
          person.id,
          input.date,
          entry?.status ?? "Gelmedi",
          entry?.checkIn ?? null,
          entry?.checkOut ?? null,
          entry?.notes ?? "",
        );
      }

      return this.list({ from: input.date, to: input.date });
    })();
  }
}
