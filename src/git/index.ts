export * from "./git";
export * from "./git.types";
