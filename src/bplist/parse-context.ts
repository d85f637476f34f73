import type { ObjRef } from "./types/bplist-index-aliases";

/** Where in the input a decode step is looking. */
export interface IParseContext {
  readonly offset?: number;
  readonly objRef?: ObjRef;
}
