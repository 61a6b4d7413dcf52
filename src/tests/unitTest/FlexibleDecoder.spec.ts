import { classifyFlexible, dropNulls, flexibleString, flexibleStringList, flexibleStringListSchema, flexibleStringSchema } from '../../core/utils/FlexibleDecoder';

describe('FlexibleDecoder', () => {
  it('classe chaque forme dans sa branche', () => {
    expect(classifyFlexible('7')).toEqual({ kind: 'string', value: '7' });
    expect(classifyFlexible(7)).toEqual({ kind: 'number', value: 7 });
    expect(classifyFlexible(['a', 'b'])).toEqual({ kind: 'list', value: ['a', 'b'] });
    expect(classifyFlexible({ a: 1 })).toEqual({ kind: 'unknown' });
    expect(classifyFlexible(null)).toEqual({ kind: 'unknown' });
  });

  it('flexibleString normalise chaîne et nombre', () => {
    expect(flexibleString('7')).toBe('7');
    expect(flexibleString(7)).toBe('7');
    expect(flexibleString(622918)).toBe('622918');
    expect(flexibleString(null)).toBe('');
    expect(flexibleString({ id: 1 })).toBe('');
    expect(flexibleString(['a'])).toBe('');
  });

  it('flexibleStringList accepte une chaîne seule ou une liste', () => {
    expect(flexibleStringList('a')).toEqual(['a']);
    expect(flexibleStringList(['a', 'b'])).toEqual(['a', 'b']);
    expect(flexibleStringList(['a', 3, 'b'])).toEqual(['a', 'b']);
    expect(flexibleStringList(undefined)).toEqual([]);
    expect(flexibleStringList(42)).toEqual([]);
  });

  it('les schémas zod appliquent la même normalisation sans jamais échouer', () => {
    expect(flexibleStringSchema.parse(12)).toBe('12');
    expect(flexibleStringSchema.parse(true)).toBe('');
    expect(flexibleStringListSchema.parse('x')).toEqual(['x']);
    expect(flexibleStringListSchema.parse(undefined)).toEqual([]);
  });

  it('dropNulls retire les membres null à toute profondeur', () => {
    expect(dropNulls({ a: null, b: 1, c: { d: null, e: 'x' }, f: [{ g: null, h: 2 }, null] })).toEqual({
      b: 1,
      c: { e: 'x' },
      f: [{ h: 2 }, null],
    });
    expect(dropNulls(null)).toBeNull();
    expect(dropNulls('x')).toBe('x');
  });
});
