import { describe, it, expect } from 'vitest';
import { cleanTitle, fingerprint, normalizeText, normalizeTitle, stripDiacritics } from '../Fingerprint.js';

describe('Fingerprint', () => {
  describe('stripDiacritics', () => {
    it('quita acentos y diéresis', () => {
      expect(stripDiacritics('Beyoncé')).toBe('Beyonce');
      expect(stripDiacritics('Motörhead')).toBe('Motorhead');
    });
  });

  describe('cleanTitle', () => {
    it('quita segmentos entre paréntesis y corchetes', () => {
      expect(cleanTitle('Song (feat. Someone) [Radio Edit]')).toBe('Song');
    });

    it('quita sufijos de versión', () => {
      expect(cleanTitle('Hey Jude - Remastered 2015')).toBe('Hey Jude');
      expect(cleanTitle('Creep - Live at Glastonbury')).toBe('Creep');
    });

    it('quita "feat." sin paréntesis', () => {
      expect(cleanTitle('Song feat. Someone Else')).toBe('Song');
    });

    it('no toca guiones que no son de versión', () => {
      expect(cleanTitle('Part One - The Beginning')).toBe('Part One - The Beginning');
    });
  });

  describe('normalizeText', () => {
    it('pasa a minúsculas, quita apóstrofes y puntuación', () => {
      expect(normalizeText("Don't Stop Me Now!")).toBe('dont stop me now');
    });

    it('colapsa espacios', () => {
      expect(normalizeText('  AC/DC   Live  ')).toBe('ac dc live');
    });
  });

  describe('normalizeTitle', () => {
    it('usa el título original si al limpiarlo queda vacío', () => {
      expect(normalizeTitle('(Intro)')).toBe('intro');
    });
  });

  describe('fingerprint', () => {
    it('combina artista y título normalizados', () => {
      expect(fingerprint({ title: 'Canción (feat. X)', artist: 'Beyoncé' })).toBe('beyonce|cancion');
    });

    it('es igual para variantes del mismo tema', () => {
      const original = fingerprint({ title: 'Hey Jude', artist: 'The Beatles' });
      const remaster = fingerprint({ title: 'Hey Jude - Remastered 2015', artist: 'the beatles' });

      expect(remaster).toBe(original);
    });

    it('distingue artistas distintos', () => {
      expect(fingerprint({ title: 'Song', artist: 'A' })).not.toBe(fingerprint({ title: 'Song', artist: 'B' }));
    });
  });
});
