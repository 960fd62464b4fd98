/**
 * Text-generation collaborator: prompt in, completion out.
 * Treated as a black box; implementations may reject.
 */
export type Oracle = (prompt: string) => Promise<string>;

/** Oracle that never says anything. Every classification takes its fallback. */
export const nullOracle: Oracle = async () => '';
