import { antiTamper } from './anti-tamper';
import { constantArray } from './constant-array';
import { encryptStrings } from './encrypt-strings';
import { numbersToExpressions } from './numbers-to-expressions';
import { proxifyLocals } from './proxify-locals';
import { StepDefinition } from './step';

export * from './step';
export { AntiTamper } from './anti-tamper';
export { ConstantArray } from './constant-array';
export { EncryptStrings, Keystream } from './encrypt-strings';
export { NumbersToExpressions } from './numbers-to-expressions';
export { ProxifyLocals } from './proxify-locals';

// stepDefinitions lists every step a configuration may name.
export const stepDefinitions: readonly StepDefinition[] = [
  antiTamper,
  constantArray,
  encryptStrings,
  numbersToExpressions,
  proxifyLocals,
];

export function findStep(name: string): StepDefinition | undefined {
  return stepDefinitions.find((d) => d.name === name);
}

export function stepNames(): string[] {
  return stepDefinitions.map((d) => d.name);
}
