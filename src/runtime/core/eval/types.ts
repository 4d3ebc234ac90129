/**
 * Evaluator Mixin Types
 * @internal
 */

/**
 * Constructor type accepted by evaluator mixins.
 * The `any[]` rest parameter is what TypeScript requires of mixin bases.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type EvaluatorConstructor<T> = new (...args: any[]) => T;
