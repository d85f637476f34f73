/** index into the offset table, as stored in containers and the trailer */
export type ObjRef = number & {};
/** absolute byte offset of an object, as stored in the offset table */
export type ObjectTableOffset = number & {};
