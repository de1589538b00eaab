/**
 * 外部大量複製工具的命令組成。
 * LocalBulkCopy 複製整個資料夾；ListBasedBulkCopy 依清單檔複製到同一個資料夾。
 */
export interface BulkCopy {
  readonly kind: "local" | "list";
  command(source: string, destination: string): string[];
}

const RSYNC_BASE = ["rsync", "-a", "--checksum"];

export class LocalBulkCopy implements BulkCopy {
  readonly kind = "local";

  command(sourceRoot: string, destinationRoot: string) {
    return [...RSYNC_BASE, withSlash(sourceRoot), withSlash(destinationRoot)];
  }
}

export class ListBasedBulkCopy implements BulkCopy {
  readonly kind = "list";

  /**
   * 清單內是絕對路徑，以 / 為來源並攤平到目的資料夾。
   * 目的地已有同名檔時不覆蓋，內容不同會在校驗時被發現。
   */
  command(listPath: string, destination: string) {
    return [
      ...RSYNC_BASE,
      "--no-relative",
      "--ignore-existing",
      `--files-from=${listPath}`,
      "/",
      withSlash(destination),
    ];
  }
}

function withSlash(p: string) {
  return p.endsWith("/") ? p : `${p}/`;
}
