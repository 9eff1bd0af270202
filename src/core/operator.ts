export interface Choice<T> {
  key: string;
  label: string;
  value: T;
}

/**
 * Source of the operator's decisions. The terminal implementation reads
 * stdin; tests pass a scripted one.
 */
export interface Operator {
  /** Resolves to the value of the entered option's key, or undefined. */
  choose<T>(prompt: string, options: Choice<T>[]): Promise<T | undefined>;
  confirm(prompt: string): Promise<boolean>;
  ask(prompt: string): Promise<string>;
  acknowledge(prompt: string): Promise<void>;
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

export function pickChoice<T>(
  answer: string,
  options: Choice<T>[],
): T | undefined {
  return options.find((o) => o.key === answer.trim())?.value;
}
