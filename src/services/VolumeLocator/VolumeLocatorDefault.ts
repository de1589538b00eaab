import { readdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { PathNotFoundError } from "@/types";
import { exists } from "@/utils/helper";

import type { VolumeLocator } from "./VolumeLocator";

/**
 * 在常見的掛載目錄下找第一個含有 DCIM/ 的磁碟區。
 */
export class VolumeLocatorDefault implements VolumeLocator {
  private readonly logger: Logger;
  private readonly mountRoots: string[];

  constructor(deps: { logger: Logger; mountRoots?: string[] }) {
    this.logger = deps.logger.extend("VolumeLocator");
    const user = os.userInfo().username;
    this.mountRoots = deps.mountRoots ?? [
      path.join("/media", user),
      path.join("/run/media", user),
      "/Volumes",
    ];
  }

  async locate(): Promise<Result<string, PathNotFoundError>> {
    for (const root of this.mountRoots) {
      let names: string[];
      try {
        names = await readdir(root);
      } catch {
        this.logger.trace({ event: "skip-root" })`無法讀取 ${root}`;
        continue;
      }
      for (const name of names.sort()) {
        const volume = path.join(root, name);
        if (await exists(path.join(volume, "DCIM"))) {
          this.logger.info({ emoji: "💾", event: "found" })`找到記憶卡 ${volume}`;
          return ok(volume);
        }
      }
    }
    return err({
      type: "PATH_NOT_FOUND",
      message: `找不到含有 DCIM 的磁碟區: ${this.mountRoots.join(", ")}`,
      path: this.mountRoots.join(path.delimiter),
    });
  }
}
