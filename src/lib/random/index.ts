export * from "./fact-provider.js";
