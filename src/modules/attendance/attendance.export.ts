import * as XLSX from "xlsx";
import type { AttendanceRecord } from "./attendance.service";

export const ATTENDANCE_EXPORT_HEADERS = ["Tarih", "Personel", "Durum", "Giriş", "Çıkış", "Notlar"];

/** Builds an .xlsx workbook with one row per attendance record. */
export function buildAttendanceWorkbook(records: AttendanceRecord[]): Buffer {
  const rows = records.map((r) => [r.date, r.personnelName, r.status, r.checkIn ?? "", r.checkOut ?? "", r.notes]);

  const worksheet = XLSX.utils.aoa_to_sheet([ATTENDANCE_EXPORT_HEADERS, ...rows]);
  worksheet["!cols"] = [12, 28, 10, 8, 8, 40].map((wch) => ({ wch }));

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, "Devam");

  return XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
}
