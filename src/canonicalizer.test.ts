import { describe, it, expect } from 'vitest';
import {
  canonicalizeDirectoryName,
  canonicalizeFileName,
  collapseSeparators,
  fileExtension,
  safeDecode,
  stripDates,
  stripIdentifier,
  withNumericSuffix,
} from './canonicalizer.js';

describe('canonicalizer', () => {
  describe('canonicalizeDirectoryName', () => {
    it('should strip the date and the trailing identifier', () => {
      expect(canonicalizeDirectoryName('10 24 2024 - Event Bridge 129d6bbdbbea80')).toBe('Event_Bridge');
    });

    it('should strip ISO dates and dotted dates', () => {
      expect(canonicalizeDirectoryName('2024-10-24 Weekly Sync')).toBe('Weekly_Sync');
      expect(canonicalizeDirectoryName('24.10.2024 Review')).toBe('Review');
    });

    it('should strip a dashed UUID', () => {
      expect(canonicalizeDirectoryName('Roadmap 123e4567-e89b-12d3-a456-426614174000')).toBe('Roadmap');
    });

    it('should keep words made of hex letters and plain numbers', () => {
      expect(canonicalizeDirectoryName('My Decade')).toBe('My_Decade');
      expect(canonicalizeDirectoryName('Report 123456')).toBe('Report_123456');
    });

    it('should fall back to the placeholder when nothing is left', () => {
      expect(canonicalizeDirectoryName('---')).toBe('untitled');
      expect(canonicalizeDirectoryName('deadbeef12')).toBe('untitled');
      expect(canonicalizeDirectoryName('---', { placeholder: 'unnamed' })).toBe('unnamed');
    });

    it('should decode percent escapes', () => {
      expect(canonicalizeDirectoryName('Caf%C3%A9 Notes')).toBe('Café_Notes');
    });

    it('should be deterministic', () => {
      const raw = '01_02_2023 Planning a1b2c3d4';
      expect(canonicalizeDirectoryName(raw)).toBe(canonicalizeDirectoryName(raw));
      expect(canonicalizeDirectoryName(raw)).toBe('Planning');
    });
  });

  describe('canonicalizeFileName', () => {
    it('should prefix the parent canonical name', () => {
      expect(canonicalizeFileName('Specification.md', 'Event_Bridge')).toBe('Event_Bridge_Specification.md');
    });

    it('should not prefix a name that already equals or starts with the parent', () => {
      expect(canonicalizeFileName('Event Bridge 129d6bbdbbea80.md', 'Event_Bridge')).toBe('Event_Bridge.md');
      expect(canonicalizeFileName('Projects Roadmap.md', 'Projects')).toBe('Projects_Roadmap.md');
    });

    it('should leave root files unprefixed', () => {
      expect(canonicalizeFileName('Other File 0123456789abcdef.md')).toBe('Other_File.md');
    });

    it('should decode the name before cleaning it', () => {
      expect(canonicalizeFileName('10%2024%202024%20-%20Other%20File%20abc123.md')).toBe('Other_File.md');
    });

    it('should drop apostrophes', () => {
      expect(canonicalizeFileName("Don't Panic.md")).toBe('Dont_Panic.md');
    });

    it('should keep the extension verbatim', () => {
      expect(canonicalizeFileName('diagram 9f8e7d.PNG', 'Design')).toBe('Design_diagram.PNG');
    });

    it('should not treat a dotted version number as an extension', () => {
      expect(canonicalizeFileName('Report v1.2 abc123')).toBe('Report_v1_2');
    });
  });

  describe('helpers', () => {
    it('should leave malformed escapes untouched', () => {
      expect(safeDecode('bad%E0%A4%A')).toBe('bad%E0%A4%A');
      expect(safeDecode('50%zz')).toBe('50%zz');
      expect(safeDecode('100%25 sure')).toBe('100% sure');
    });

    it('should recognise only short alphanumeric extensions', () => {
      expect(fileExtension('notes.md')).toBe('.md');
      expect(fileExtension('Report v1.2 abc123')).toBe('');
      expect(fileExtension('README')).toBe('');
    });

    it('should replace date tokens with a space', () => {
      expect(stripDates('10_24_2024 Sync')).toBe('  Sync');
      expect(stripDates('Budget 12345 2024')).toBe('Budget 12345 2024');
    });

    it('should only honour the configured date separators', () => {
      expect(stripDates('10/24/2024 Sync', ' ')).toBe('10/24/2024 Sync');
      expect(stripDates('10/24/2024 Sync', '/')).toBe('  Sync');
    });

    it('should strip one identifier no shorter than the minimum', () => {
      expect(stripIdentifier('Note abc12')).toBe('Note abc12');
      expect(stripIdentifier('Note abc12', 5)).toBe('Note');
      expect(stripIdentifier('Note-abc123')).toBe('Note');
    });

    it('should collapse separator runs to one underscore', () => {
      expect(collapseSeparators('  - Event   Bridge -- (draft) ')).toBe('Event_Bridge_draft');
    });

    it('should append numeric suffixes before the extension', () => {
      expect(withNumericSuffix('Foo.md', 2)).toBe('Foo_2.md');
      expect(withNumericSuffix('Foo', 3)).toBe('Foo_3');
    });
  });
});
