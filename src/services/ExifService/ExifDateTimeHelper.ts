import type { ExifDateTime } from "exiftool-vendored";

const RAW_BASIC_RE = /^(\d{4}):(\d{2}):(\d{2})[ T](\d{2}):(\d{2}):(\d{2})/;

/**
 * 將 ExifDateTime 轉為「相機當地時間」的 JS Date。
 *
 * 歸檔資料夾以拍攝當地日期為準，所以不做時區換算：
 *   raw=2023:08:05 23:30:00, tz=+540 → new Date(2023, 7, 5, 23, 30, 0)
 * 無效資料回傳 undefined。
 */
export function getCaptureDate(
  time: ExifDateTime | string | undefined
): Date | undefined {
  if (!time) return undefined;
  const raw = typeof time === "string" ? time : time.rawValue;
  const m = raw ? RAW_BASIC_RE.exec(raw) : null;
  if (m) {
    const [year, month, day, hour, minute, second] = m
      .slice(1, 7)
      .map((v) => Number(v));
    // 0000:00:00 00:00:00 是相機未設定時間時常見的值
    if (year === 0 || month === 0 || day === 0) return undefined;
    const d = new Date(year, month - 1, day, hour, minute, second);
    if (!Number.isNaN(d.getTime())) return d;
    return undefined;
  }
  if (typeof time === "string") return undefined;
  if (!time.isValid) return undefined;
  const d = new Date(
    time.year,
    time.month - 1,
    time.day,
    time.hour,
    time.minute,
    time.second
  );
  return Number.isNaN(d.getTime()) ? undefined : d;
}
