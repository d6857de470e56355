export type * from "./types/properties.js";
export type * from "./types/graph.js";
export type * from "./types/import.js";
export type * from "./types/review.js";
export type * from "./types/api.js";
export type * from "./store.js";
