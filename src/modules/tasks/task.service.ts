import { Db, insertedId, toBoolean, toFlag } from "../../shared/db/database";
import { assignments, Filters, SqlValue } from "../../shared/db/query";
import { notFound } from "../../shared/http/api-error";
import { PersonnelService } from "../personnel/personnel.service";
import { CreateTaskInput, UpdateTaskInput } from "./task.dto";

export type Task = {
  id: number;
  personnelId: number;
  personnelName: string;
  description: string;
  date: string;
  greenhouse: string | null;
  completed: boolean;
  notes: string;
  createdAt: string;
};

type TaskRow = Omit<Task, "completed"> & { completed: number };

export type TaskListOptions = {
  from?: string;
  to?: string;
  personnelId?: number;
  completed?: boolean;
  limit?: number;
};

const SELECT_TASK = `
  SELECT g.id, g.personnel_id AS personnelId, p.name AS personnelName, g.description, g.date,
         g.greenhouse, g.completed, g.notes, g.created_at AS createdAt
    FROM tasks g
    JOIN personnel p ON p.id = g.personnel_id`;

const toTask = (row: TaskRow): Task => ({ ...row, completed: toBoolean(row.completed) });

export class TaskService {
  private readonly personnel: PersonnelService;

  constructor(private readonly db: Db) {
    this.personnel = new PersonnelService(db);
  }

  list(opts: TaskListOptions = {}): Task[] {
    const filters = new Filters();
    if (opts.from) filters.add("g.date >= ?", opts.from);
    if (opts.to) filters.add("g.date <= ?", opts.to);
    if (opts.personnelId) filters.add("g.personnel_id = ?", opts.personnelId);
    if (opts.completed !== undefined) filters.add("g.completed = ?", toFlag(opts.completed));

    const limit = opts.limit === undefined ? "" : `LIMIT ${Math.max(1, Math.trunc(opts.limit))}`;

    return this.db
      .prepare<SqlValue[], TaskRow>(`${SELECT_TASK} ${filters.toSql()} ORDER BY g.date DESC, g.id DESC ${limit}`)
      .all(...filters.params)
      .map(toTask);
  }

  get(id: number): Task {
    const row = this.db.prepare<[number], TaskRow>(`${SELECT_TASK} WHERE g.id = ?`).get(id);
    if (!row) {
      throw notFound("Görev");
    }
    return toTask(row);
  }

  create(input: CreateTaskInput): Task {
    return this.db.transaction(() => {
      this.personnel.assertExists(input.personnelId);

      // Tasks mostly log work already done, so they default to completed.
      const completed = input.completed ?? true;

      const result = this.db
        .prepare<SqlValue[]>(
          `INSERT INTO tasks (personnel_id, description, date, greenhouse, completed, notes)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(
          input.personnelId,
          input.description,
          input.date,
          input.greenhouse ?? null,
          toFlag(completed),
          input.notes ?? "",
        );
      return this.get(insertedId(result.lastInsertRowid));
    })();
  }

  update(id: number, input: UpdateTaskInput): Task {
    return this.db.transaction(() => {
      this.get(id);

      if (input.personnelId !== undefined) {
        this.personnel.assertExists(input.personnelId);
      }

      const set = assignments({
        personnel_id: input.personnelId,
        description: input.description,
        date: input.date,
        greenhouse: input.greenhouse,
        completed: input.completed === undefined ? undefined : toFlag(input.completed),
        notes: input.notes,
      });

      if (set.sql) {
        this.db.prepare<SqlValue[]>(`UPDATE tasks SET ${set.sql} WHERE id = ?`).run(...set.params, id);
      }

      return this.get(id);
    })();
  }

  remove(id: number): void {
    this.db.transaction(() => {
      this.get(id);
      this.db.prepare<[number]>("DELETE FROM tasks WHERE id = ?").run(id);
    })();
  }
}
