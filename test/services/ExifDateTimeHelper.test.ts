import { ExifDateTime } from "exiftool-vendored";
import { describe, expect, test } from "vitest";

import { getCaptureDate } from "@/services/ExifService/ExifDateTimeHelper";

describe("getCaptureDate", () => {
  test("以相機當地時間建立 Date，不做時區換算", () => {
    expect(getCaptureDate("2023:08:05 23:30:00")).toEqual(
      new Date(2023, 7, 5, 23, 30, 0)
    );
    expect(getCaptureDate("2023:08:05 23:30:00+09:00")).toEqual(
      new Date(2023, 7, 5, 23, 30, 0)
    );
  });

  test("ExifDateTime 也取當地時間", () => {
    const dt = ExifDateTime.fromEXIF("2023:08:05 23:30:00+09:00");
    expect(dt).toBeDefined();
    if (dt) {
      expect(getCaptureDate(dt)).toEqual(new Date(2023, 7, 5, 23, 30, 0));
    }
  });

  test("未設定的時間視為沒有日期", () => {
    expect(getCaptureDate("0000:00:00 00:00:00")).toBeUndefined();
    expect(getCaptureDate("not a date")).toBeUndefined();
    expect(getCaptureDate(undefined)).toBeUndefined();
  });
});
