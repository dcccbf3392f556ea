export * from "./SidecarParser";
export * from "./SidecarParserDefault";
