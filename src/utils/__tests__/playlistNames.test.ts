import { describe, expect, it } from 'vitest';
import { findSimilarName, isSimilarName } from '../playlistNames.js';

describe('playlistNames', () => {
  describe('isSimilarName', () => {
    it('compara sin mayúsculas', () => {
      expect(isSimilarName('Rock Classics', 'rock classics')).toBe(true);
    });

    it('acepta dos palabras significativas en común', () => {
      expect(isSimilarName('Best of Rock 2020', 'Rock Best Hits')).toBe(true);
    });

    it('ignora la puntuación en nombres cortos', () => {
      expect(isSimilarName('Mi Mix', 'mi mix!')).toBe(true);
    });

    it('una sola palabra en común no alcanza', () => {
      expect(isSimilarName('Chill', 'Chill Vibes')).toBe(false);
    });

    it('nombres distintos no se parecen', () => {
      expect(isSimilarName('Workout', 'Study')).toBe(false);
    });
  });

  describe('findSimilarName', () => {
    it('devuelve el primer candidato parecido', () => {
      const candidates = [{ id: 1, name: 'Study' }, { id: 2, name: 'rock classics' }, { id: 3, name: 'Rock Classics' }];

      expect(findSimilarName('Rock Classics', candidates, candidate => candidate.name)?.id).toBe(2);
    });

    it('devuelve undefined si no hay ninguno', () => {
      expect(findSimilarName('Jazz', ['Metal', 'Pop'], name => name)).toBeUndefined();
    });
  });
});
