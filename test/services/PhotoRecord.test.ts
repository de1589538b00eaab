import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, test } from "vitest";

import {
  buildTestLogger,
  buildTestLoggerWithRecords,
} from "~shared/testkit/TestLogger";

import { ChecksumCache } from "@/services/Checksum/ChecksumCache";
import {
  PhotoRecord,
  PhotoRecordFactory,
  parseSequenceNumber,
} from "@/services/PhotoRecord";
import { ExifServiceFake } from "~test/fakes/ExifServiceFake";
import { makeTmpDir } from "~test/helpers/tmp";

describe("parseSequenceNumber", () => {
  test("取檔名最後一段數字的末四碼", () => {
    expect(parseSequenceNumber("/card/DSC01234.ARW")).toBe("1234");
    expect(parseSequenceNumber("/card/_DSC0007.ARW")).toBe("0007");
    expect(parseSequenceNumber("/card/IMG_20230805_0012.JPG")).toBe("0012");
  });

  test("沒有數字時為 unknown", () => {
    expect(parseSequenceNumber("/card/cover.arw")).toBe("unknown");
  });
});

describe("PhotoRecord", () => {
  test("副檔名轉小寫並可判斷類型", () => {
    const record = new PhotoRecord({
      sourcePath: "/card/DSC01234.ARW",
      hasher: new ChecksumCache(),
    });
    expect(record.extension).toBe("arw");
    expect(record.isRaw("ARW")).toBe(true);
    expect(record.isRaw(".arw")).toBe(true);
    expect(record.isJpg()).toBe(false);
  });

  test("可指定序號", () => {
    const record = new PhotoRecord({
      sourcePath: "/card/DSC01234.ARW",
      hasher: new ChecksumCache(),
      sequenceNumber: "1935",
    });
    expect(record.sequenceNumber).toBe("1935");
  });

  test("外部修改傳入的 Date 不影響紀錄", () => {
    const date = new Date(2023, 7, 5);
    const record = new PhotoRecord({
      sourcePath: "/card/DSC01234.ARW",
      hasher: new ChecksumCache(),
      metadata: { captureDate: date },
    });
    date.setFullYear(1999);
    expect(record.captureDate?.getFullYear()).toBe(2023);
  });

  test("雜湊只計算一次", async () => {
    const dir = await makeTmpDir();
    const file = join(dir, "DSC00001.ARW");
    await writeFile(file, "raw-bytes");

    let calls = 0;
    const cache = new ChecksumCache(async (p) => {
      calls++;
      return `hash-of-${p}`;
    });
    const record = new PhotoRecord({ sourcePath: file, hasher: cache });
    const [a, b] = await Promise.all([record.contentHash(), record.contentHash()]);
    await record.contentHash();
    expect(a).toBe(`hash-of-${file}`);
    expect(b).toBe(a);
    expect(calls).toBe(1);
  });

  test("matches 比對另一個檔案的內容", async () => {
    const dir = await makeTmpDir();
    const a = join(dir, "a.arw");
    const same = join(dir, "same.arw");
    const other = join(dir, "other.arw");
    await writeFile(a, "content-1");
    await writeFile(same, "content-1");
    await writeFile(other, "content-2");

    const record = new PhotoRecord({ sourcePath: a, hasher: new ChecksumCache() });
    expect(await record.matches(same)).toBe(true);
    expect(await record.matches(other)).toBe(false);
  });
});

describe("ChecksumCache", () => {
  test("同一路徑的同時請求共用結果", async () => {
    const dir = await makeTmpDir();
    const file = join(dir, "x.jpg");
    await writeFile(file, "hello");
    const cache = new ChecksumCache();
    const [a, b] = await Promise.all([cache.hash(file), cache.hash(file)]);
    expect(a).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824"
    );
    expect(b).toBe(a);
    expect(cache.computed).toBe(1);
  });

  test("invalidate 後重新計算", async () => {
    const dir = await makeTmpDir();
    const file = join(dir, "x.jpg");
    await writeFile(file, "one");
    const cache = new ChecksumCache();
    const first = await cache.hash(file);
    await writeFile(file, "two");
    expect(await cache.hash(file)).toBe(first);
    cache.invalidate(file);
    expect(await cache.hash(file)).not.toBe(first);
    expect(cache.computed).toBe(2);
  });

  test("讀取失敗不會被快取", async () => {
    const dir = await makeTmpDir();
    const file = join(dir, "later.jpg");
    const cache = new ChecksumCache();
    await expect(cache.hash(file)).rejects.toThrow();
    await writeFile(file, "hello");
    expect(await cache.hash(file)).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824"
    );
  });
});

describe("PhotoRecordFactory", () => {
  test("讀入 EXIF 欄位", async () => {
    const exif = new ExifServiceFake();
    exif.setExif("/card/DSC01234.ARW", {
      captureDate: new Date(2023, 7, 5),
      camera: "a7r4",
      iso: 800,
    });
    const factory = new PhotoRecordFactory({
      logger: buildTestLogger(),
      exifService: exif,
      hasher: new ChecksumCache(),
    });
    const record = await factory.create("/card/DSC01234.ARW", { withExif: true });
    expect(record.metadata.camera).toBe("a7r4");
    expect(record.metadata.iso).toBe(800);
    expect(record.captureDate).toEqual(new Date(2023, 7, 5));
  });

  test("讀不到 EXIF 時沒有中繼資料並記錄警告", async () => {
    const exif = new ExifServiceFake();
    const { logger, transport } = buildTestLoggerWithRecords();
    const factory = new PhotoRecordFactory({
      logger,
      exifService: exif,
      hasher: new ChecksumCache(),
    });
    const record = await factory.create("/card/DSC00001.ARW", { withExif: true });
    expect(record.captureDate).toBeUndefined();
    expect(record.metadata.camera).toBeUndefined();
    expect(transport.byLevel("warn")).toHaveLength(1);
    expect(transport.byLevel("warn")[0].event).toBe("exif-missing");
  });
});
