import { type Static, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import path from "node:path";

import { buildConfigFactoryEnv, envInteger } from "~shared/ConfigFactory";
import { type Result, err, ok } from "~shared/utils/Result";

import {
  defaultEditedSuffix,
  defaultOutputDirs,
  defaultRetryPolicy,
  defaultTruncationLength,
  embeddedMetadataExtensions,
} from "@/constants";

export const getRestoreEnvConfig = buildConfigFactoryEnv(
  t.Object({
    RESTORE_EDITED_SUFFIX: t.Optional(t.String({ minLength: 1 })),
    RESTORE_TRUNCATION_LENGTH: t.Optional(envInteger({ minimum: 1 })),
    RESTORE_RETRY_ATTEMPTS: t.Optional(envInteger({ minimum: 1 })),
    RESTORE_RETRY_DELAY_MS: t.Optional(envInteger({ minimum: 0 })),
  })
);

const restoreConfigSchema = t.Object({
  sourceRoot: t.String({ minLength: 1 }),
  matchedRoot: t.String({ minLength: 1 }),
  rawOriginalsRoot: t.String({ minLength: 1 }),
  logsRoot: t.String({ minLength: 1 }),
  // 後綴會被插進檔名，不可含路徑分隔符號
  editedSuffix: t.String({ minLength: 1, pattern: "^[^/\\\\]+$" }),
  truncationLength: t.Integer({ minimum: 1 }),
  embeddedExtensions: t.Array(t.String({ pattern: "^\\.[^.]+$" })),
  retry: t.Object({
    attempts: t.Integer({ minimum: 1, maximum: 10 }),
    delayMs: t.Integer({ minimum: 0 }),
  }),
  removeSidecars: t.Boolean(),
});

type RestoreConfigShape = Static<typeof restoreConfigSchema>;

export type RestoreConfig = Readonly<
  Omit<RestoreConfigShape, "retry" | "embeddedExtensions"> & {
    retry: Readonly<RestoreConfigShape["retry"]>;
    embeddedExtensions: readonly string[];
  }
>;

export type RestoreConfigOverrides = Partial<
  Omit<RestoreConfig, "sourceRoot" | "retry">
> & {
  retryAttempts?: number;
  retryDelayMs?: number;
};

export type ConfigIssue = { type: "INVALID_CONFIG"; message: string };

/**
 * 合併預設值、環境變數與 CLI 參數，產生不可變的執行設定。
 * 優先順序：CLI 參數 > 環境變數 > 預設值。
 */
export function buildRestoreConfig(
  sourceRoot: string,
  overrides: RestoreConfigOverrides = {},
  env: Record<string, string | undefined> = process.env
): Result<RestoreConfig, ConfigIssue> {
  let envConfig: ReturnType<typeof getRestoreEnvConfig>;
  try {
    envConfig = getRestoreEnvConfig(env);
  } catch (e) {
    return err({
      type: "INVALID_CONFIG",
      message: e instanceof Error ? e.message : String(e),
    });
  }

  const root = path.resolve(sourceRoot);
  const candidate = {
    sourceRoot: root,
    matchedRoot: path.resolve(
      overrides.matchedRoot ?? path.join(root, defaultOutputDirs.matched)
    ),
    rawOriginalsRoot: path.resolve(
      overrides.rawOriginalsRoot ??
        path.join(root, defaultOutputDirs.rawOriginals)
    ),
    logsRoot: path.resolve(
      overrides.logsRoot ?? path.join(root, defaultOutputDirs.logs)
    ),
    editedSuffix:
      overrides.editedSuffix ??
      envConfig.RESTORE_EDITED_SUFFIX ??
      defaultEditedSuffix,
    truncationLength:
      overrides.truncationLength ??
      envConfig.RESTORE_TRUNCATION_LENGTH ??
      defaultTruncationLength,
    embeddedExtensions: (
      overrides.embeddedExtensions ?? embeddedMetadataExtensions
    ).map((e) => (e.startsWith(".") ? e : `.${e}`).toLowerCase()),
    retry: {
      attempts:
        overrides.retryAttempts ??
        envConfig.RESTORE_RETRY_ATTEMPTS ??
        defaultRetryPolicy.attempts,
      delayMs:
        overrides.retryDelayMs ??
        envConfig.RESTORE_RETRY_DELAY_MS ??
        defaultRetryPolicy.delayMs,
    },
    removeSidecars: overrides.removeSidecars ?? false,
  };

  if (!Value.Check(restoreConfigSchema, candidate)) {
    const issues = [...Value.Errors(restoreConfigSchema, candidate)].map(
      (e) => `${e.path}: ${e.message}`
    );
    return err({ type: "INVALID_CONFIG", message: issues.join("; ") });
  }

  return ok(
    Object.freeze({
      ...candidate,
      retry: Object.freeze({ ...candidate.retry }),
      embeddedExtensions: Object.freeze([...candidate.embeddedExtensions]),
    })
  );
}
