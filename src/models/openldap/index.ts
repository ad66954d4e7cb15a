export * from "./group";
export * from "./user";
