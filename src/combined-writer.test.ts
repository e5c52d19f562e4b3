import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { CombinedWriter, extractTitle, rebaseLinks } from './combined-writer.js';

describe('CombinedWriter', () => {
  const testDir = join(process.cwd(), '.test-tmp', 'combined-writer');
  const outputRoot = join(testDir, 'output');
  const combinedPath = join(testDir, 'combined', 'combined.md');

  beforeEach(() => {
    mkdirSync(join(outputRoot, 'Sub'), { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should join files under title delimiters with rebased links', async () => {
    writeFileSync(join(outputRoot, 'A.md'), '# Alpha\n\nSee [b](Sub/B.md).\n');
    writeFileSync(join(outputRoot, 'Sub', 'B.md'), 'Beta line\n[a](../A.md)\n');
    writeFileSync(join(outputRoot, 'Sub', 'image.png'), 'binary');

    const writer = new CombinedWriter({ outputRoot, combinedPath, markdownExtensions: ['.md'] });

    expect(await writer.write()).toBe(true);
    expect(readFileSync(combinedPath, 'utf-8')).toBe(
      '--- Alpha ---\n# Alpha\n\nSee [b](../output/Sub/B.md).\n' +
        '\n' +
        '--- Beta line ---\nBeta line\n[a](../output/A.md)\n'
    );
  });

  it('should fall back to the file name for an empty file', async () => {
    writeFileSync(join(outputRoot, 'Empty.md'), '');

    await new CombinedWriter({ outputRoot, combinedPath, markdownExtensions: ['.md'] }).write();

    expect(readFileSync(combinedPath, 'utf-8')).toBe('--- Empty ---\n\n');
  });

  it('should not rewrite an unchanged digest', async () => {
    writeFileSync(join(outputRoot, 'A.md'), '# Alpha\n');
    const writer = new CombinedWriter({ outputRoot, combinedPath, markdownExtensions: ['.md'] });

    expect(await writer.write()).toBe(true);
    expect(await writer.write()).toBe(false);
  });

  it('should leave itself out when written inside the output root', async () => {
    writeFileSync(join(outputRoot, 'A.md'), '# Alpha\n');
    const inside = join(outputRoot, 'all.md');
    const writer = new CombinedWriter({ outputRoot, combinedPath: inside, markdownExtensions: ['.md'] });

    await writer.write();
    expect(await writer.write()).toBe(false);
    expect(readFileSync(inside, 'utf-8')).toBe('--- Alpha ---\n# Alpha\n');
  });

  describe('extractTitle', () => {
    it('should prefer the first level-one heading', () => {
      expect(extractTitle('## Sub\n# Main\ntext')).toBe('Main');
    });

    it('should fall back to the first line without heading marks', () => {
      expect(extractTitle('## Only sub\nmore')).toBe('Only sub');
      expect(extractTitle('\n\nPlain start\n')).toBe('Plain start');
    });

    it('should return null for blank content', () => {
      expect(extractTitle('')).toBeNull();
      expect(extractTitle('   \n\n')).toBeNull();
    });
  });

  it('should rebase only relative links', () => {
    const content = '[a](x.md#s) [b](https://example.com) [c](/abs.md) [d](#top)';
    expect(rebaseLinks(content, '/root/out/Sub', '/root/digest')).toBe(
      '[a](../out/Sub/x.md#s) [b](https://example.com) [c](/abs.md) [d](#top)'
    );
  });
});
