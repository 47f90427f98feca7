export * from "./jobs"
