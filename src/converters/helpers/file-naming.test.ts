import { describe, it, expect } from 'vitest';
import { fileExtension, scaledFileName, scaleSuffix } from './file-naming';

const x2 = { tag: 'x2', value: 2 };

describe('scaledFileName', () => {
  it('inserts the suffix before the extension', () => {
    expect(scaledFileName('rail.nl2mat', x2, { suffix: '_{tag}' })).toBe('rail_x2.nl2mat');
  });

  it('keeps the name when the suffix is empty', () => {
    expect(scaledFileName('rail.nl2mat', x2, { suffix: '' })).toBe('rail.nl2mat');
  });

  it('only renames the last path segment', () => {
    expect(scaledFileName('materials/v1.2/rail.nl2mat', x2, { suffix: '-{tag}' })).toBe('materials/v1.2/rail-x2.nl2mat');
    expect(scaledFileName('materials\\rail.nl2mat', x2, { suffix: '-{tag}' })).toBe('materials\\rail-x2.nl2mat');
  });

  it('handles names without an extension and dot files', () => {
    expect(scaledFileName('rail', x2, { suffix: '_{tag}' })).toBe('rail_x2');
    expect(scaledFileName('.hidden', x2, { suffix: '_{tag}' })).toBe('.hidden_x2');
  });
});

describe('scaleSuffix', () => {
  it('replaces every tag placeholder', () => {
    expect(scaleSuffix(x2, { suffix: '_{tag}_{tag}' })).toBe('_x2_x2');
  });
});

describe('fileExtension', () => {
  it('lower-cases the extension', () => {
    expect(fileExtension('shapes/Rail.NL2MAT')).toBe('.nl2mat');
    expect(fileExtension('README')).toBe('');
  });
});
