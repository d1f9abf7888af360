import { array, json, Status } from '@kernelpdf/base';
import { KernelDictionary } from './dictionary.js';
import { InvalidGridError, InvalidInputError, InvalidSigmaGridError } from './errors.js';

describe('KernelDictionary', () => {
  const dict = new KernelDictionary(array.linspace(-5, 5, 11), [0.5, 1.0, 1.5]);

  test('layout', () => {
    expect(dict.Ngrid).toBe(11);
    expect(dict.delta).toBe(1);
    expect(dict.min).toBe(-5);
    expect(dict.max).toBe(5);
    expect(dict.Ndict).toBe(3);
    expect(dict.dsigma).toBe(0.5);
    expect(dict.sigmaTrunc).toBe(5);
    expect(Array.from(dict.width)).toEqual([3, 5, 8]);
  });

  test('kernels', () => {
    expect(dict.kernel.map(k => k.length)).toEqual([7, 11, 17]);
    expect(dict.kernel[1][5]).toBeCloseTo(0.3989422804, 10);

    const cdf = dict.kernelCdf[1];
    expect(cdf.length).toBe(11);
    expect(cdf[0]).toBe(dict.kernel[1][0]);
    expect(cdf[10]).toBeCloseTo(0.9999999932, 10);

    // symmetric about the center
    for (const k of dict.kernel) {
      const n = k.length;
      for (let i = 0; i < n; i++) expect(k[i]).toBe(k[n - 1 - i]);
    }
  });

  test('kernels wider than the grid', () => {
    const d = new KernelDictionary([0, 1, 2], [1, 2], { sigmaTrunc: 3 });
    expect(Array.from(d.width)).toEqual([3, 6]);
    expect(d.kernel[1].length).toBe(13);
  });

  describe('fit', () => {
    test('nearest grid point and kernel', () => {
      const { gridIndices, dictIndices } = dict.fit([0, -5, 5, 2.2, 4.9], [1, 0.5, 1.5, 1.1, 1.74]);

      expect(Array.from(gridIndices)).toEqual([5, 0, 10, 7, 10]);
      expect(Array.from(dictIndices)).toEqual([1, 0, 2, 1, 2]);
    });

    test('ties round to even', () => {
      const { gridIndices, dictIndices } = dict.fit([0.5, 1.5, -0.5], [0.75, 1.25, 1]);

      expect(Array.from(gridIndices)).toEqual([6, 6, 4]);
      expect(Array.from(dictIndices)).toEqual([0, 2, 1]);
    });

    test('sigmas are clamped, values are not', () => {
      const { gridIndices, dictIndices } = dict.fit([100, -100], [9, 0.1]);

      expect(Array.from(gridIndices)).toEqual([105, -95]);
      expect(Array.from(dictIndices)).toEqual([2, 0]);
    });

    test('non-finite values', () => {
      const { gridIndices } = dict.fit([NaN, Infinity, 0, 1], [1, 1, NaN, Infinity]);

      expect(gridIndices[0]).toBeNaN();
      expect(gridIndices[1]).toBeNaN();
      expect(gridIndices[2]).toBeNaN();
      expect(gridIndices[3]).toBe(6);
    });

    test('mismatched lengths', () => {
      expect(() => dict.fit([0, 1], [1])).toThrow(InvalidInputError);
    });

    test('empty batch', () => {
      const { gridIndices, dictIndices } = dict.fit([], []);
      expect(gridIndices.length).toBe(0);
      expect(dictIndices.length).toBe(0);
    });
  });

  describe('validation', () => {
    const errorOf = <T>(s: Status<T>) => (Status.isErr(s) ? s[1] : undefined);

    test('grids', () => {
      expect(errorOf(KernelDictionary.create([0], [1, 2]))).toBeInstanceOf(InvalidGridError);
      expect(errorOf(KernelDictionary.create([0, 1, 3], [1, 2]))).toBeInstanceOf(InvalidGridError);
      expect(errorOf(KernelDictionary.create([2, 1, 0], [1, 2]))).toBeInstanceOf(InvalidGridError);
    });

    test('sigma grids', () => {
      expect(errorOf(KernelDictionary.create([0, 1], [1]))).toBeInstanceOf(InvalidSigmaGridError);
      expect(errorOf(KernelDictionary.create([0, 1], [0, 1]))).toBeInstanceOf(
        InvalidSigmaGridError,
      );
      expect(errorOf(KernelDictionary.create([0, 1], [1, 2, 4]))).toBeInstanceOf(
        InvalidSigmaGridError,
      );
      expect(errorOf(KernelDictionary.create([0, 1], [2, 1]))).toBeInstanceOf(
        InvalidSigmaGridError,
      );
    });

    test('truncation', () => {
      const s = KernelDictionary.create([0, 1], [1, 2], { sigmaTrunc: 0 });
      expect(errorOf(s)).toBeInstanceOf(InvalidSigmaGridError);
      expect(errorOf(s)?.message).toBe('Expected a positive truncation factor, got 0');
    });

    test('error codes', () => {
      const err = errorOf(KernelDictionary.create([0], [1, 2]));
      expect(err).toBeInstanceOf(InvalidGridError);
      expect(err instanceof InvalidGridError && err.code).toBe('InvalidGrid');
      expect(err?.name).toBe('InvalidGridError');
    });

    test('the constructor throws', () => {
      expect(() => new KernelDictionary([0, 1, 3], [1, 2])).toThrow(InvalidGridError);
      expect(() => new KernelDictionary([0, 1], [-1, 1])).toThrow(InvalidSigmaGridError);
    });

    test('create reports the error the constructor throws', () => {
      const s = KernelDictionary.create([0, 1, 3], [1, 2]);

      expect(errorOf(s)?.message).toBe('Expected an increasing, evenly spaced grid');
      expect(() => new KernelDictionary([0, 1, 3], [1, 2])).toThrow(
        'Expected an increasing, evenly spaced grid',
      );
    });

    test('create', () => {
      const d = Status.get(KernelDictionary.create([0, 0.5, 1], [0.1, 0.2]));
      expect(d.Ngrid).toBe(3);
      expect(Array.from(d.width)).toEqual([1, 2]);
    });
  });

  describe('json', () => {
    test('round trip', () => {
      const doc = dict.toJson();
      expect(doc).toEqual({
        grid: [-5, -4, -3, -2, -1, 0, 1, 2, 3, 4, 5],
        sigmaGrid: [0.5, 1, 1.5],
        sigmaTrunc: 5,
      });

      const copy = Status.get(KernelDictionary.fromJson(JSON.parse(JSON.stringify(doc))));
      expect(Array.from(copy.width)).toEqual([3, 5, 8]);
      expect(copy.kernel[2]).toEqual(dict.kernel[2]);
    });

    test('malformed documents', () => {
      const docs: json.Value[] = [null, 1, [], { grid: [0, 1], sigmaGrid: [1, 2] }, { grid: 'x' }];

      for (const doc of docs) {
        const s = KernelDictionary.fromJson(doc);
        expect(Status.isErr(s) && s[1]).toBeInstanceOf(InvalidInputError);
      }
    });

    test('invalid grids in a document', () => {
      const s = KernelDictionary.fromJson({ grid: [0, 1], sigmaGrid: [1, 2], sigmaTrunc: -1 });
      expect(Status.isErr(s) && s[1]).toBeInstanceOf(InvalidSigmaGridError);
    });
  });
});
