export * from "./alertsCommand";
export * from "./cliArgs";
export * from "./format";
export * from "./paths";
export * from "./TextSurface";
export * from "./viewState";
export * from "./watch";
