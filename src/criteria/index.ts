export * from "./monitoringCriteria";
