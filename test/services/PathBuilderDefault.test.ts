import { describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import {
  PathBuilderDefault,
  byteLength,
  truncateBytes,
} from "@/services/PathBuilder";
import { type PhotoMetadata, PhotoRecord } from "@/services/PhotoRecord";

const hasher = { hash: async () => "unused" };

const sampleMetadata: PhotoMetadata = {
  captureDate: new Date(2023, 7, 5, 21, 30, 0),
  camera: "a7r4",
  exposureBias: "-2 7",
  exposureValue: "10",
  brightness: "8.27",
  iso: 800,
  shutterSpeed: "SS",
  lens: "SAMYANG AF 12mm F2.0",
};

function record(sourcePath: string, metadata?: PhotoMetadata) {
  return new PhotoRecord({ sourcePath, hasher, metadata });
}

const sample = record("/card/DCIM/100MSDCF/DSC01234.ARW", sampleMetadata);

describe("PathBuilderDefault.generateName", () => {
  const builder = new PathBuilderDefault({ archiveRoot: "/archive" });

  test("完整檔名依固定順序串接，快門速度值後接 SS 標記，小數點換成空白", () => {
    expect(builder.generateName(sample)).toBe(
      "20230805_a7r4_1234_-2 7EB_10EV_8 27B_800ISO_SSSS_SAMYANG AF 12mm F2 0.arw"
    );
  });

  test("沒有快門速度時只留下 SS 標記", () => {
    const noShutter = record("/card/DCIM/100MSDCF/DSC01234.ARW", {
      ...sampleMetadata,
      shutterSpeed: undefined,
    });
    expect(builder.generateName(noShutter)).toBe(
      "20230805_a7r4_1234_-2 7EB_10EV_8 27B_800ISO_SS_SAMYANG AF 12mm F2 0.arw"
    );
  });

  test("快門速度中的 / 換成 -", () => {
    const shutter = record("/card/DCIM/100MSDCF/DSC01234.ARW", {
      ...sampleMetadata,
      shutterSpeed: "1/250",
    });
    expect(builder.generateName(shutter)).toBe(
      "20230805_a7r4_1234_-2 7EB_10EV_8 27B_800ISO_1-250SS_SAMYANG AF 12mm F2 0.arw"
    );
  });

  test("短檔名只有序號與曝光欄位", () => {
    expect(builder.generateName(sample, { short: true })).toBe(
      "1234_-2 7EB_10EV_8 27B.arw"
    );
  });

  test("沒有拍攝日期時使用 00000000，其餘缺值留空", () => {
    expect(builder.generateName(record("/card/IMG_0042.ARW"))).toBe(
      "00000000__0042_EB_EV_B_ISO_SS_.arw"
    );
  });

  test("overrides 可指定序號", () => {
    expect(
      builder.generateName(sample, { overrides: { number: "1935" } })
    ).toBe(
      "20230805_a7r4_1935_-2 7EB_10EV_8 27B_800ISO_SSSS_SAMYANG AF 12mm F2 0.arw"
    );
  });

  test("數值欄位的小數點不會出現在副檔名之前", () => {
    const name = builder.generateName(
      record("/card/DSC00001.ARW", {
        exposureBias: -0.7,
        exposureValue: 12.5,
        brightness: 3.14,
        shutterSpeed: 0.5,
      })
    );
    expect(name).toBe("00000000__0001_-0 7EB_12 5EV_3 14B_ISO_0 5SS_.arw");
    expect(name.slice(0, name.lastIndexOf(".")).includes(".")).toBe(false);
  });

  test("檔名不合法的字元換成 -", () => {
    const name = builder.generateName(
      record("/card/DSC00002.ARW", { camera: "A/B", shutterSpeed: "1/250" })
    );
    expect(name).toBe("00000000_A-B_0002_EB_EV_B_ISO_1-250SS_.arw");
  });
});

describe("PathBuilderDefault.generatePath", () => {
  const limit = 254;

  test("放在 {root}/{YYYY}/{YYYY-MM-DD}/ 之下", () => {
    const builder = new PathBuilderDefault({ archiveRoot: "/archive/" });
    const result = builder.generatePath(sample);
    expectOk(result);
    expect(result.value).toBe(
      "/archive/2023/2023-08-05/20230805_a7r4_1234_-2 7EB_10EV_8 27B_800ISO_SSSS_SAMYANG AF 12mm F2 0.arw"
    );
  });

  test("沒有日期時使用 0000/0000-00-00", () => {
    const builder = new PathBuilderDefault({ archiveRoot: "/archive" });
    const result = builder.generatePath(record("/card/IMG_0042.ARW"));
    expectOk(result);
    expect(result.value).toBe(
      "/archive/0000/0000-00-00/00000000__0042_EB_EV_B_ISO_SS_.arw"
    );
  });

  test("完整檔名放不下時改用短檔名", () => {
    const root = `/${"r".repeat(199)}`;
    const builder = new PathBuilderDefault({ archiveRoot: root, pathLimit: limit });
    const result = builder.generatePath(sample);
    expectOk(result);
    expect(result.value).toBe(`${root}/2023/2023-08-05/1234_-2 7EB_10EV_8 27B.arw`);
  });

  test("短檔名也放不下時截斷並加上 ---", () => {
    const root = `/${"r".repeat(211)}`;
    const builder = new PathBuilderDefault({ archiveRoot: root, pathLimit: limit });
    const result = builder.generatePath(sample);
    expectOk(result);
    expect(result.value).toBe(`${root}/2023/2023-08-05/1234_-2 7EB_10EV_8---.arw`);
    expect(byteLength(result.value)).toBe(limit);
  });

  test("根目錄本身過長時回傳 PATH_TOO_LONG", () => {
    const root = `/${"r".repeat(239)}`;
    const builder = new PathBuilderDefault({ archiveRoot: root, pathLimit: limit });
    const result = builder.generatePath(sample);
    expectErr(result);
    expect(result.error.type).toBe("PATH_TOO_LONG");
    expect(result.error.sourcePath).toBe(sample.sourcePath);
  });

  test("任何根目錄長度都不會超過上限", () => {
    const multiByte = record("/card/DSC09999.ARW", {
      ...sampleMetadata,
      camera: "相機".repeat(20),
      lens: "鏡頭".repeat(20),
    });
    for (let len = 1; len < limit; len++) {
      const builder = new PathBuilderDefault({
        archiveRoot: `/${"d".repeat(len)}`,
        pathLimit: limit,
      });
      for (const r of [sample, multiByte]) {
        const result = builder.generatePath(r);
        if (result.ok) expect(byteLength(result.value)).toBeLessThanOrEqual(limit);
        else expect(result.error.type).toBe("PATH_TOO_LONG");
      }
    }
  });
});

describe("truncateBytes", () => {
  test("不切斷多位元組字元", () => {
    expect(truncateBytes("相機ab", 4)).toBe("相");
    expect(truncateBytes("相機ab", 7)).toBe("相機a");
  });
});
