export * from "./RestoreLogWriter";
export * from "./RestoreLogWriterDefault";
