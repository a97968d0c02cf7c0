export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) {
    throw new Error("Chunk size must be greater than zero.");
  }

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function sortedTokens(tokens: Iterable<string>): string[] {
  return [...new Set(tokens)].sort();
}

export function tokenSetKey(tokens: ReadonlySet<string>): string {
  return sortedTokens(tokens).join("\u0001");
}

export function incrementCount(target: Record<string, number>, key: string, by = 1): void {
  target[key] = (target[key] ?? 0) + by;
}

export function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}
