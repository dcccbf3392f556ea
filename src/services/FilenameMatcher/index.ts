export * from "./FilenameMatcher";
export * from "./FilenameMatcherDefault";
