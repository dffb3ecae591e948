export * from "./history"
