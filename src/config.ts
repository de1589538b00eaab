import { Type as t } from "@sinclair/typebox";

import {
  buildConfigFactoryEnv,
  envBoolean,
  envNumber,
} from "~shared/ConfigFactory";

import {
  defaultMaxNameAttempts,
  defaultMaxRetries,
  defaultPathLimit,
  defaultRawExtension,
  defaultRetryDelayMs,
} from "./constants";

const getEnvConfig = buildConfigFactoryEnv(
  t.Object({
    /** RAW 歸檔根目錄 */
    IMPORT_RAW_PATH: t.Optional(t.String()),
    IMPORT_JPG_PATH: t.Optional(t.String()),
    IMPORT_BACKUP_PATH: t.Optional(t.String()),
    IMPORT_RAW_EXTENSION: t.Optional(t.String()),
    IMPORT_MAX_RETRIES: t.Optional(envNumber({ integer: true, minimum: 1 })),
    IMPORT_RETRY_DELAY_MS: t.Optional(envNumber({ integer: true, minimum: 0 })),
    IMPORT_PATH_LIMIT: t.Optional(envNumber({ integer: true, minimum: 1 })),
    IMPORT_MAX_NAME_ATTEMPTS: t.Optional(
      envNumber({ integer: true, minimum: 1 })
    ),
    IMPORT_DRY_RUN: t.Optional(envBoolean()),
  })
);

export type ImportConfig = {
  rawPath?: string;
  jpgPath?: string;
  backupPath?: string;
  rawExtension: string;
  maxRetries: number;
  retryDelayMs: number;
  pathLimit: number;
  maxNameAttempts: number;
  dryRun: boolean;
};

export function loadImportConfig(): ImportConfig {
  const env = getEnvConfig();
  return {
    rawPath: env.IMPORT_RAW_PATH,
    jpgPath: env.IMPORT_JPG_PATH,
    backupPath: env.IMPORT_BACKUP_PATH,
    rawExtension: env.IMPORT_RAW_EXTENSION ?? defaultRawExtension,
    maxRetries: env.IMPORT_MAX_RETRIES ?? defaultMaxRetries,
    retryDelayMs: env.IMPORT_RETRY_DELAY_MS ?? defaultRetryDelayMs,
    pathLimit: env.IMPORT_PATH_LIMIT ?? defaultPathLimit,
    maxNameAttempts: env.IMPORT_MAX_NAME_ATTEMPTS ?? defaultMaxNameAttempts,
    dryRun: env.IMPORT_DRY_RUN ?? false,
  };
}
