import { format } from "date-fns";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import {
  dateFolderOverhead,
  defaultPathLimit,
  truncationMarker,
} from "@/constants";
import type { PhotoRecord } from "@/services/PhotoRecord";
import type { PathTooLongError } from "@/types";

import type {
  GenerateNameOptions,
  NameFields,
  PathBuilder,
} from "./PathBuilder";

const ILLEGAL_CHARS_RE = /[/\\:*?"<>|]/g;

export class PathBuilderDefault implements PathBuilder {
  private readonly archiveRoot: string;
  private readonly pathLimit: number;

  constructor(deps: { archiveRoot: string; pathLimit?: number }) {
    this.archiveRoot = deps.archiveRoot;
    this.pathLimit = deps.pathLimit ?? defaultPathLimit;
  }

  generateName(record: PhotoRecord, options?: GenerateNameOptions): string {
    const f: NameFields = { ...fieldsOf(record), ...options?.overrides };
    return `${this.generateStem(f, options?.short ?? false)}.${f.extension}`;
  }

  generatePath(
    record: PhotoRecord,
    archiveRoot = this.archiveRoot
  ): Result<string, PathTooLongError> {
    const root = trimTrailingSep(archiveRoot);
    const f = fieldsOf(record);
    // 扣掉 /YYYY/YYYY-MM-DD/ 與截斷記號 ---. 後，檔名主體可用的 bytes
    const budget =
      this.pathLimit -
      byteLength(root) -
      byteLength(f.extension) -
      dateFolderOverhead -
      truncationMarker.length -
      1;
    if (budget < 1) {
      return err({
        type: "PATH_TOO_LONG",
        message: `歸檔根目錄過長，無法放入任何檔名: ${root}`,
        sourcePath: record.sourcePath,
        archiveRoot: root,
      });
    }

    const full = this.generateStem(f, false);
    let name: string;
    if (byteLength(full) <= budget) {
      name = `${full}.${f.extension}`;
    } else {
      const short = this.generateStem(f, true);
      name =
        byteLength(short) <= budget
          ? `${short}.${f.extension}`
          : `${truncateBytes(short, budget)}${truncationMarker}.${f.extension}`;
    }

    const date = record.metadata.captureDate;
    const year = date ? format(date, "yyyy") : "0000";
    const day = date ? format(date, "yyyy-MM-dd") : "0000-00-00";
    return ok(path.join(root, year, day, name));
  }

  private generateStem(f: NameFields, short: boolean) {
    const exposure = [
      `${f.exposureBias}EB`,
      `${f.exposureValue}EV`,
      `${f.brightness}B`,
    ];
    const parts = short
      ? [f.number, ...exposure]
      : [
          f.date,
          f.camera,
          f.number,
          ...exposure,
          `${f.iso}ISO`,
          `${f.shutterSpeed}SS`,
          f.lens,
        ];
    // 小數點換成空白，避免與副檔名的點混淆
    return parts.join("_").replaceAll(".", " ");
  }
}

function fieldsOf(record: PhotoRecord): NameFields {
  const m = record.metadata;
  return {
    date: m.captureDate ? format(m.captureDate, "yyyyMMdd") : "00000000",
    camera: render(m.camera),
    number: render(record.sequenceNumber),
    exposureBias: render(m.exposureBias),
    exposureValue: render(m.exposureValue),
    brightness: render(m.brightness),
    iso: render(m.iso),
    shutterSpeed: render(m.shutterSpeed),
    lens: render(m.lens),
    extension: record.extension,
  };
}

function render(value: string | number | undefined) {
  if (value === undefined) return "";
  return String(value).trim().replace(ILLEGAL_CHARS_RE, "-");
}

function trimTrailingSep(p: string) {
  const normalized = path.normalize(p);
  return normalized.length > 1 && normalized.endsWith(path.sep)
    ? normalized.slice(0, -1)
    : normalized;
}

export function byteLength(s: string) {
  return Buffer.byteLength(s, "utf8");
}

/** 依 UTF-8 bytes 截斷，不切斷多位元組字元 */
export function truncateBytes(s: string, maxBytes: number) {
  let used = 0;
  let out = "";
  for (const ch of s) {
    const size = byteLength(ch);
    if (used + size > maxBytes) break;
    used += size;
    out += ch;
  }
  return out;
}
