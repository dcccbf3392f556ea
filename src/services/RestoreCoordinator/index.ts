export * from "./RestoreCoordinator";
export * from "./RestoreCoordinatorDefault";
