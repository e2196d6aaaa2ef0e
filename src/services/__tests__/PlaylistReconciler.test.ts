import { describe, expect, it } from 'vitest';
import { computePlan, hasChanges, isUpToDate } from '../PlaylistReconciler.js';

const ids = (count: number, prefix = 't'): string[] =>
  Array.from({ length: count }, (_, index) => `${prefix}${index + 1}`);

describe('PlaylistReconciler', () => {
  describe('computePlan', () => {
    it('separa agregar, quitar y sin cambios', () => {
      const plan = computePlan(['a', 'b', 'c'], ['b', 'c', 'd']);

      expect(plan.toAdd).toEqual(['a']);
      expect(plan.toRemove).toEqual(['d']);
      expect(plan.unchanged).toEqual(['b', 'c']);
      expect(plan.retained).toEqual([]);
    });

    it('ignora ids repetidos', () => {
      const plan = computePlan(['a', 'a', 'b'], ['b', 'b']);

      expect(plan.toAdd).toEqual(['a']);
      expect(plan.unchanged).toEqual(['b']);
      expect(plan.toRemove).toEqual([]);
    });

    it('en modo append no quita y conserva los extras', () => {
      const plan = computePlan(['a'], ['x', 'y'], true);

      expect(plan.toAdd).toEqual(['a']);
      expect(plan.toRemove).toEqual([]);
      expect(plan.retained).toEqual(['x', 'y']);
    });

    it('aplicar el plan deja el estado deseado y el segundo plan está vacío', () => {
      const desired = ['a', 'b', 'c'];
      const observed = ['c', 'd'];
      const plan = computePlan(desired, observed);

      const applied = observed.filter(id => !plan.toRemove.includes(id)).concat(plan.toAdd);
      const second = computePlan(desired, applied);

      expect(new Set(applied)).toEqual(new Set(desired));
      expect(hasChanges(second)).toBe(false);
    });

    it('en modo append el resultado es la unión', () => {
      const observed = ['x', 'a'];
      const plan = computePlan(['a', 'b'], observed, true);
      const applied = [...observed, ...plan.toAdd];

      expect(new Set(applied)).toEqual(new Set([...plan.unchanged, ...plan.toAdd, ...plan.retained]));
      expect(new Set(applied)).toEqual(new Set(['a', 'b', 'x']));
    });

    it('conserva las canciones sin resolver', () => {
      const unresolved = [{ sourceId: 's9', title: 'Lost', artist: 'Nobody', durationSeconds: 100 }];

      expect(computePlan([], [], false, unresolved).unresolved).toBe(unresolved);
    });
  });

  describe('isUpToDate', () => {
    it('9 de 10 presentes con tolerancia 0.9 está al día', () => {
      const plan = computePlan(ids(10), ids(9));

      expect(plan.toAdd).toEqual(['t10']);
      expect(isUpToDate(plan, 0.9)).toBe(true);
    });

    it('8 de 10 presentes con tolerancia 0.9 no está al día', () => {
      expect(isUpToDate(computePlan(ids(10), ids(8)), 0.9)).toBe(false);
    });

    it('con tolerancia 1.0 hace falta que estén todas', () => {
      expect(isUpToDate(computePlan(ids(10), ids(9)), 1)).toBe(false);
      expect(isUpToDate(computePlan(ids(10), ids(10)), 1)).toBe(true);
    });

    it('sin canciones resueltas está al día', () => {
      expect(isUpToDate(computePlan([], ['x']), 0.9)).toBe(true);
    });
  });

  describe('hasChanges', () => {
    it('detecta altas y bajas', () => {
      expect(hasChanges(computePlan(['a'], []))).toBe(true);
      expect(hasChanges(computePlan([], ['a']))).toBe(true);
      expect(hasChanges(computePlan(['a'], ['a']))).toBe(false);
    });
  });
});
