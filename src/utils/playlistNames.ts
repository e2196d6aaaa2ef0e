function wordsOf(name: string): Set<string> {
  const cleaned = name.toLowerCase().replace(/[^\p{L}\p{N}_\s]/gu, '');
  return new Set(cleaned.split(/\s+/).filter(word => word.length > 0));
}

/**
 * ¿`name` se parece a `existing`? Iguales sin mayúsculas, al menos dos palabras
 * significativas (más de 2 letras) en común, o para nombres cortos al menos el 70% de las palabras.
 */
export function isSimilarName(name: string, existing: string): boolean {
  if (name.toLowerCase() === existing.toLowerCase()) {
    return true;
  }

  const nameWords = wordsOf(name);
  const existingWords = wordsOf(existing);
  const common = [...nameWords].filter(word => existingWords.has(word));
  const meaningful = common.filter(word => word.length > 2);

  if (meaningful.length >= 2) {
    return true;
  }

  return nameWords.size <= 3 && common.length >= Math.max(2, nameWords.size * 0.7);
}

export function findSimilarName<T>(name: string, candidates: readonly T[], nameOf: (candidate: T) => string): T | undefined {
  return candidates.find(candidate => isSimilarName(name, nameOf(candidate)));
}
