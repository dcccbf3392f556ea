export * from "./FormatCapability";
export * from "./MetadataApplier";
export * from "./MetadataApplierDefault";
