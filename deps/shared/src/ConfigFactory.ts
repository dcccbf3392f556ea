import { type Static, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * 以 typebox schema 描述環境變數，回傳讀取函式。
 * 讀取時依序套用 default、型別轉換（"true" → true、"3" → 3）與驗證；
 * 驗證失敗會丟出 ConfigError。
 */
export function buildConfigFactoryEnv<T extends TObject>(schema: T) {
  return (
    env: Record<string, string | undefined> = process.env
  ): Static<T> => {
    const picked: Record<string, unknown> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }
    const converted = Value.Convert(schema, Value.Default(schema, picked));
    if (!Value.Check(schema, converted)) {
      const issues = [...Value.Errors(schema, converted)].map(
        (e) => `${e.path || "/"}: ${e.message}`
      );
      throw new ConfigError(`環境變數設定錯誤: ${issues.join("; ")}`, issues);
    }
    return converted;
  };
}

export function envBoolean(options?: { default?: boolean }) {
  return t.Boolean(options);
}

export function envInteger(options?: {
  default?: number;
  minimum?: number;
  maximum?: number;
}) {
  return t.Integer(options);
}
