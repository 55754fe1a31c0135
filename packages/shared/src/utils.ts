export function formatRatio(compressed: number, original: number): string {
  if (original === 0) {
    return 'n/a';
  }
  return `${((compressed / original) * 100).toFixed(2)}%`;
}

export function validateRequired<T>(
  value: T | null | undefined,
  fieldName: string
): T {
  if (value === null || value === undefined) {
    throw new Error(`${fieldName} is required`);
  }
  return value;
}
