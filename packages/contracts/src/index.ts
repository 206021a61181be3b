export * from "./content";
export * from "./ingest";
