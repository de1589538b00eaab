export type * from "./ChecksumValidator";
export * from "./ChecksumValidatorDefault";
