/**
 * Input of a table row: the value itself, or a function building it when a
 * row must not share objects with other rows (the "inputs left untouched"
 * properties rely on this).
 */
export type ScenarioInput<T> = T | (() => T);

/**
 * One row of a `test.for` table. Rows are named `[$id] $description` in the
 * runner output, so `id` stays short and `description` states the rule the
 * row pins down.
 */
export type TestScenario<TInput = unknown, TExpected = unknown> = {
  id: string;
  description: string;
  input: ScenarioInput<TInput>;
  expected: TExpected;
};
