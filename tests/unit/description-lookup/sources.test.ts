import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createLogger } from '@/infra/logger/index.js';
import { readDescriptionRows, readRephraseRows } from '@/modules/description-lookup/index.js';

const logger = createLogger({ level: 'silent', pretty: false });

const writeSource = async (name: string, contents: string): Promise<string> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'description-lookup-'));
  const filePath = path.join(dir, name);
  await writeFile(filePath, contents, 'utf8');
  return filePath;
};

describe('readDescriptionRows', () => {
  it('reads labels as strings', async () => {
    const filePath = await writeSource(
      'descriptions.csv',
      ['label,description', '1110,Wheat farmer', '01700,Gamekeeper'].join('\n')
    );

    const result = await readDescriptionRows({ filePath, logger });

    expect(result._unsafeUnwrap()).toEqual([
      { label: '1110', description: 'Wheat farmer' },
      { label: '01700', description: 'Gamekeeper' },
    ]);
  });

  it('fails on an empty label', async () => {
    const filePath = await writeSource(
      'descriptions.csv',
      ['label,description', ',Wheat farmer'].join('\n')
    );

    const result = await readDescriptionRows({ filePath, logger });

    expect(result._unsafeUnwrapErr().type).toBe('SchemaValidationError');
  });
});

describe('readRephraseRows', () => {
  it('maps source columns onto rephrase rows', async () => {
    const filePath = await writeSource(
      'rephrased-descriptions.csv',
      ['sic_code,reviewed_description', '01700,"Hunting, trapping and gamekeeping"'].join('\n')
    );

    const result = await readRephraseRows({ filePath, logger });

    expect(result._unsafeUnwrap()).toEqual([
      { code: '01700', reviewedDescription: 'Hunting, trapping and gamekeeping' },
    ]);
  });

  it('fails when the file does not exist', async () => {
    const filePath = path.join(tmpdir(), 'description-lookup-missing', 'rephrased.csv');

    const result = await readRephraseRows({ filePath, logger });

    expect(result._unsafeUnwrapErr().type).toBe('NotFound');
  });
});
