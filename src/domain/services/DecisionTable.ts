export interface DecisionRule<TInput, TOutcome> {
  when: (input: TInput) => boolean;
  then: (input: TInput) => TOutcome;
}

/**
 * Evaluates rules top to bottom and returns the first match. Order is part of the
 * contract: callers list rules in priority order.
 */
export const decide = <TInput, TOutcome>(
  rules: ReadonlyArray<DecisionRule<TInput, TOutcome>>,
  otherwise: (input: TInput) => TOutcome,
  input: TInput,
): TOutcome => {
  const match = rules.find((rule) => rule.when(input));
  return match ? match.then(input) : otherwise(input);
};
