import assert from "node:assert/strict";
import { describe, test } from "node:test";
import * as XLSX from "xlsx";
import { ZodError } from "zod";
import { ApiError } from "../../shared/http/api-error";
import { addPersonnel, countRows, createTestContext } from "../../test/helpers";
import { ATTENDANCE_EXPORT_HEADERS, buildAttendanceWorkbook } from "./attendance.export";
import { AttendanceService } from "./attendance.service";

describe("attendance records", () => {
  test("allow one record per person and day", () => {
    const ctx = createTestContext();
    const worker = addPersonnel(ctx, { name: "Ali" });
    const attendance = new AttendanceService(ctx.db);

    const record = attendance.create({ personnelId: worker.id, date: "2026-06-01", status: "Geldi", checkIn: "08:00" });
    assert.equal(record.personnelName, "Ali");
    assert.equal(record.checkIn, "08:00");
    assert.equal(record.checkOut, null);

    assert.throws(
      () => attendance.create({ personnelId: worker.id, date: "2026-06-01", status: "İzinli" }),
      (err: unknown) =>
        err instanceof ApiError &&
        err.statusCode === 409 &&
        err.message === "Bu personel için bu tarihte zaten devam kaydı var",
    );
  });

  test("record a daily sheet for every active person", () => {
    const ctx = createTestContext();
    const ali = addPersonnel(ctx, { name: "Ali" });
    const veli = addPersonnel(ctx, { name: "Veli" });
    addPersonnel(ctx, { name: "Pasif", active: false });
    const attendance = new AttendanceService(ctx.db);

    const first = attendance.recordDay({
      date: "2026-06-01",
      entries: [{ personnelId: ali.id, status: "Geldi", checkIn: "08:00", checkOut: "17:00" }],
    });
    assert.deepEqual(
      first.map((r) => [r.personnelName, r.status]),
      [
        ["Ali", "Geldi"],
        ["Veli", "Gelmedi"],
      ],
    );

    const second = attendance.recordDay({
      date: "2026-06-01",
      entries: [
        { personnelId: ali.id, status: "Rapor" },
        { personnelId: veli.id, status: "Geldi" },
      ],
    });
    assert.deepEqual(
      second.map((r) => [r.personnelName, r.status, r.checkIn]),
      [
        ["Ali", "Rapor", null],
        ["Veli", "Geldi", null],
      ],
    );
    assert.equal(countRows(ctx, "attendance"), 2);
  });

  test("reject sheet entries for inactive personnel", () => {
    const ctx = createTestContext();
    addPersonnel(ctx, { name: "Ali" });
    const passive = addPersonnel(ctx, { name: "Pasif", active: false });
    const attendance = new AttendanceService(ctx.db);

    assert.throws(
      () => attendance.recordDay({ date: "2026-06-01", entries: [{ personnelId: passive.id, status: "Geldi" }] }),
      (err: unknown) => err instanceof ZodError && err.issues[0].path.join(".") === "entries",
    );
    assert.equal(countRows(ctx, "attendance"), 0);
  });

  test("reject a sheet that lists the same person twice", () => {
    const ctx = createTestContext();
    const ali = addPersonnel(ctx, { name: "Ali" });
    const attendance = new AttendanceService(ctx.db);

    assert.throws(
      () =>
        attendance.recordDay({
          date: "2026-06-01",
          entries: [
            { personnelId: ali.id, status: "Geldi" },
            { personnelId: ali.id, status: "Rapor" },
          ],
        }),
      (err: unknown) =>
        err instanceof ZodError &&
        err.issues[0].path.join(".") === "entries" &&
        err.issues[0].message === `Personel #${ali.id} için birden fazla kayıt gönderildi`,
    );
    assert.equal(countRows(ctx, "attendance"), 0);
  });

  test("filter by status and list chronologically", () => {
    const ctx = createTestContext();
    const worker = addPersonnel(ctx, { name: "Ali" });
    const attendance = new AttendanceService(ctx.db);
    attendance.create({ personnelId: worker.id, date: "2026-06-02", status: "Gelmedi" });
    attendance.create({ personnelId: worker.id, date: "2026-06-01", status: "Geldi" });
    attendance.create({ personnelId: worker.id, date: "2026-06-03", status: "Geldi" });

    assert.deepEqual(
      attendance.list({ status: "Geldi" }).map((r) => r.date),
      ["2026-06-03", "2026-06-01"],
    );
    assert.deepEqual(
      attendance.list({ chronological: true, to: "2026-06-02" }).map((r) => r.date),
      ["2026-06-01", "2026-06-02"],
    );
  });

  test("summarize statuses per day", () => {
    const ctx = createTestContext();
    const ali = addPersonnel(ctx, { name: "Ali" });
    const veli = addPersonnel(ctx, { name: "Veli" });
    const attendance = new AttendanceService(ctx.db);
    attendance.create({ personnelId: ali.id, date: "2026-06-01", status: "Geldi" });
    attendance.create({ personnelId: veli.id, date: "2026-06-01", status: "İzinli" });
    attendance.create({ personnelId: ali.id, date: "2026-06-02", status: "Rapor" });
    attendance.create({ personnelId: veli.id, date: "2026-06-02", status: "Gelmedi" });
    attendance.create({ personnelId: ali.id, date: "2026-05-31", status: "Geldi" });

    assert.deepEqual(attendance.dailySummary({ from: "2026-06-01", to: "2026-06-07" }), [
      { date: "2026-06-02", total: 2, present: 0, absent: 1, leave: 0, sick: 1 },
      { date: "2026-06-01", total: 2, present: 1, absent: 0, leave: 1, sick: 0 },
    ]);
  });

  test("export records to a workbook", () => {
    const ctx = createTestContext();
    const worker = addPersonnel(ctx, { name: "Ali" });
    const attendance = new AttendanceService(ctx.db);
    attendance.create({
      personnelId: worker.id,
      date: "2026-06-01",
      status: "Geldi",
      checkIn: "08:00",
      checkOut: "17:00",
      notes: "Tam gün",
    });

    const workbook = XLSX.read(buildAttendanceWorkbook(attendance.list()), { type: "buffer" });
    const rows = XLSX.utils.sheet_to_json<string[]>(workbook.Sheets[workbook.SheetNames[0]], { header: 1 });

    assert.deepEqual(workbook.SheetNames, ["Devam"]);
    assert.deepEqual(rows, [ATTENDANCE_EXPORT_HEADERS, ["2026-06-01", "Ali", "Geldi", "08:00", "17:00", "Tam gün"]]);
  });
});
