import { describe, it, expect } from 'vitest';
import { applyPatch, presentFields } from '../../src/utils/patch';

interface Sample {
  name: string;
  price: number;
  stock: number;
}

describe('applyPatch', () => {
  const base: Sample = { name: 'Desk Lamp', price: 10, stock: 4 };

  it('overwrites only the fields present in the patch', () => {
    expect(applyPatch(base, { price: 12 })).toEqual({ name: 'Desk Lamp', price: 12, stock: 4 });
  });

  it('treats null and undefined as absent', () => {
    expect(applyPatch(base, { name: null, stock: undefined })).toEqual(base);
  });

  it('keeps zero and empty string values', () => {
    expect(applyPatch(base, { stock: 0, name: '' })).toEqual({ name: '', price: 10, stock: 0 });
  });

  it('does not mutate the target', () => {
    applyPatch(base, { price: 99 });
    expect(base.price).toBe(10);
  });
});

describe('presentFields', () => {
  it('keeps only the fields that carry a value', () => {
    expect(presentFields<Sample>({ price: 12, name: null, stock: undefined })).toEqual({ price: 12 });
  });

  it('keeps zero and empty string values', () => {
    expect(presentFields<Sample>({ stock: 0, name: '' })).toEqual({ stock: 0, name: '' });
  });
});
