import { Marker } from "../markers";
import type { ObjRef } from "../types/bplist-index-aliases";
import type { PlistScalar } from "../../value/value";

export type ArrayLikeMarker = Marker.array | Marker.set | Marker.orderedSet;

const arrayLikeTypeNames = {
  [Marker.array]: 'array',
  [Marker.set]: 'set',
  [Marker.orderedSet]: 'orderedSet',
} as const;

/** Sets and ordered sets decode to arrays; the type is kept for logging. */
export class ObjectTableArrayLike {
  readonly typeName: 'array' | 'set' | 'orderedSet';
  constructor(
    readonly type: ArrayLikeMarker,
    readonly objrefs: readonly ObjRef[],
  ) {
    this.typeName = arrayLikeTypeNames[type];
  }
}

type DictKeyValue = readonly [key: ObjRef, value: ObjRef];
export class ObjectTableDict {
  constructor(
    readonly entries: readonly DictKeyValue[],
  ) { }
}

export type ObjectTableEntry = PlistScalar | ObjectTableDict | ObjectTableArrayLike;
