import { type StaticDecode, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/**
 * 以 TypeBox schema 描述環境變數，回傳讀取函式。
 * 每次呼叫都重新讀取 process.env，空字串視同未設定。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T
): () => StaticDecode<T> {
  return () => {
    const raw: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = process.env[key];
      if (value === undefined || value === "") continue;
      raw[key] = value;
    }
    return Value.Decode(schema, raw);
  };
}

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export function envBoolean() {
  return t
    .Transform(t.String())
    .Decode((value) => {
      const lower = value.trim().toLowerCase();
      if (TRUE_VALUES.has(lower)) return true;
      if (FALSE_VALUES.has(lower)) return false;
      throw new Error(`無法解析為布林值: ${value}`);
    })
    .Encode((value) => String(value));
}

export function envNumber(options?: { integer?: boolean; minimum?: number }) {
  return t
    .Transform(t.String())
    .Decode((value) => {
      const n = Number(value.trim());
      if (!Number.isFinite(n)) throw new Error(`無法解析為數字: ${value}`);
      if (options?.integer && !Number.isInteger(n))
        throw new Error(`必須為整數: ${value}`);
      if (options?.minimum !== undefined && n < options.minimum)
        throw new Error(`不可小於 ${options.minimum}: ${value}`);
      return n;
    })
    .Encode((value) => String(value));
}
