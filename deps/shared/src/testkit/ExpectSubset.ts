import { expect } from "vitest";

/**
 * 只比對 expected 有列出的欄位。
 */
export function expectHasSubset<T extends object>(
  actual: T,
  expected: Partial<T>
) {
  expect(actual).toMatchObject(expected);
}
