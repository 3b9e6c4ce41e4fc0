export * from "./common";
export * from "./cost";
export * from "./insights";
export * from "./engine";
