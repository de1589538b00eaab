export * from "./NameMigrationService";
