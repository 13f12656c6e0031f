export * from "./FileCopier";
export * from "./FileCopierDefault";
