export * from "./models";
export * from "./profile";
export * from "./sample-data";
