/**
 * Nesting bound shared by the decoder, the encoder and the comparator.
 * The root sits at depth 0 and a container's children one deeper; any node deeper than this is rejected.
 */
export const DEFAULT_MAX_DEPTH = 512;

/**
 * Bound on the nodes a decoded tree expands to, counting a shared subtree once per place it appears.
 * A few hundred bytes of nested shared refs can otherwise expand to millions of nodes.
 */
export const DEFAULT_MAX_NODES = 2 ** 20;
