export * from "./FileOrganizer";
export * from "./FileOrganizerDefault";
