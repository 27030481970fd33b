import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { formatGlossary, GlossaryLoader } from '../../src/glossary/GlossaryLoader.js';

describe('GlossaryLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'glossary-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('renders one bullet per row and skips the header', async () => {
    const file = path.join(dir, 'terms.csv');
    await fs.writeFile(file, 'term,definition\nASL,Age-sensitive logic\nGH,"Geo-handler, routes by region"\n');

    const loader = new GlossaryLoader(file);

    expect(await loader.getText()).toBe('- ASL: Age-sensitive logic\n- GH: Geo-handler, routes by region');
  });

  it('skips rows without a definition', async () => {
    const file = path.join(dir, 'terms.csv');
    await fs.writeFile(file, 'term,definition\nlonely\nNR,Not recommended\n');

    const entries = await new GlossaryLoader(file).load();

    expect(entries).toEqual([{ term: 'NR', definition: 'Not recommended' }]);
  });

  it('returns an empty string when the file is missing', async () => {
    const loader = new GlossaryLoader(path.join(dir, 'missing.csv'));

    expect(await loader.getText()).toBe('');
  });

  it('does not retry after a failed load', async () => {
    const file = path.join(dir, 'late.csv');
    const loader = new GlossaryLoader(file);

    expect(await loader.getText()).toBe('');

    await fs.writeFile(file, 'term,definition\nT5,Most sensitive data tier\n');

    expect(await loader.getText()).toBe('');
  });

  it('returns an empty string without retrying when the path is a directory', async () => {
    const file = path.join(dir, 'terms.csv');
    await fs.mkdir(file);
    const loader = new GlossaryLoader(file);

    expect(await loader.getText()).toBe('');

    await fs.rm(file, { recursive: true });
    await fs.writeFile(file, 'term,definition\nGH,Geo-handler\n');

    expect(await loader.getText()).toBe('');
  });

  it('reads the file only once', async () => {
    const file = path.join(dir, 'terms.csv');
    await fs.writeFile(file, 'term,definition\nPF,Personalized feed\n');
    const loader = new GlossaryLoader(file);

    const first = await loader.getText();
    await fs.writeFile(file, 'term,definition\nPF,Changed\n');

    expect(await loader.getText()).toBe(first);
    expect(first).toBe('- PF: Personalized feed');
  });

  it('yields an empty glossary for a header-only file', async () => {
    const file = path.join(dir, 'empty.csv');
    await fs.writeFile(file, 'term,definition\n');

    expect(await new GlossaryLoader(file).getText()).toBe('');
  });
});

describe('formatGlossary', () => {
  it('joins entries with newlines', () => {
    expect(
      formatGlossary([
        { term: 'A', definition: 'first' },
        { term: 'B', definition: 'second' },
      ])
    ).toBe('- A: first\n- B: second');
  });
});
