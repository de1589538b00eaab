import { join } from "node:path";
import { describe, expect, test } from "vitest";

import { isOk } from "~shared/utils/Result";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { makeTmpDir, writeFileDeep } from "~test/helpers/tmp";

describe("FileSystemScannerDefault", () => {
  test("遞迴列出所有檔案並排序", async () => {
    const root = await makeTmpDir("scanner-");
    await writeFileDeep(root, "subdir/b.arw", "b");
    await writeFileDeep(root, "a.jpg", "a");

    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(root);

    expect(isOk(result)).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual([join(root, "a.jpg"), join(root, "subdir/b.arw")]);
    }
  });

  test("預設略過隱藏檔與隱藏資料夾", async () => {
    const root = await makeTmpDir("scanner-");
    await writeFileDeep(root, "DCIM/100MSDCF/DSC00001.ARW", "raw");
    await writeFileDeep(root, "DCIM/100MSDCF/._DSC00001.ARW", "meta");
    await writeFileDeep(root, ".Trashes/501/old.jpg", "old");

    const scanner = new FileSystemScannerDefault();
    const hidden = await scanner.scan(root);
    const all = await scanner.scan(root, { includeHidden: true });

    expect(hidden.ok && hidden.value).toEqual([
      join(root, "DCIM/100MSDCF/DSC00001.ARW"),
    ]);
    expect(all.ok && all.value.length).toBe(3);
  });

  test("可依副檔名過濾", async () => {
    const root = await makeTmpDir("scanner-");
    await writeFileDeep(root, "a.JPG", "a");
    await writeFileDeep(root, "b.arw", "b");

    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(root, { allowExts: ["jpg"] });
    expect(result.ok && result.value).toEqual([join(root, "a.JPG")]);
  });

  test("遇到不存在的路徑應回傳錯誤", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan("no_such_path");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe("SCAN_FAILED");
    }
  });
});
