import { InvalidArgumentError } from 'commander';

export function parseInteger(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}, got "${value}".`);
    }
    return parsed;
  };
}
