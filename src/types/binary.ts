/**
 * Binary record type definitions
 */

/** Byte container accepted by the struct helpers */
export type BinarySource = ArrayBuffer | Uint8Array;

/** Structure field definition: Map of field name to format character */
export type StructureDefinition = Map<string, string>;
