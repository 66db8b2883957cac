export * from "./Material";
