export * from "./mtbReport";
export * from "./vocabulary";
export * from "./parserConfig";
