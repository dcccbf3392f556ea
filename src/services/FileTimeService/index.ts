export * from "./FileTimeService";
export * from "./FileTimeServiceDefault";
