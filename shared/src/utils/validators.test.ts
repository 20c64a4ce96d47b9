import {
  isEmpty,
  isInvalidCopies,
  isInvalidCount,
  isInvalidIsbn,
  isInvalidPrice,
  isInvalidRating,
} from './validators';

describe('Catalog validators', () => {
  describe('isInvalidIsbn', () => {
    it('accepts positive integers', () => {
      expect(isInvalidIsbn(1)).toBe(false);
      expect(isInvalidIsbn(3044560)).toBe(false);
      expect(isInvalidIsbn(9780134685991)).toBe(false);
    });

    it('rejects zero, negatives and fractions', () => {
      expect(isInvalidIsbn(0)).toBe(true);
      expect(isInvalidIsbn(-7)).toBe(true);
      expect(isInvalidIsbn(1.5)).toBe(true);
      expect(isInvalidIsbn(Number.NaN)).toBe(true);
    });

    it('rejects integers beyond the safe range', () => {
      expect(isInvalidIsbn(Number.MAX_SAFE_INTEGER)).toBe(false);
      expect(isInvalidIsbn(2 ** 53)).toBe(true);
    });
  });

  describe('isInvalidRating', () => {
    it('accepts every whole rating from 0 to 5', () => {
      for (const rating of [0, 1, 2, 3, 4, 5]) {
        expect(isInvalidRating(rating)).toBe(false);
      }
    });

    it('rejects values outside the scale or between steps', () => {
      expect(isInvalidRating(-1)).toBe(true);
      expect(isInvalidRating(6)).toBe(true);
      expect(isInvalidRating(2.5)).toBe(true);
    });
  });

  it('requires at least one copy', () => {
    expect(isInvalidCopies(1)).toBe(false);
    expect(isInvalidCopies(0)).toBe(true);
    expect(isInvalidCopies(-3)).toBe(true);
    expect(isInvalidCopies(0.5)).toBe(true);
    expect(isInvalidCopies(2 ** 53)).toBe(true);
  });

  it('allows a zero result count but not a negative one', () => {
    expect(isInvalidCount(0)).toBe(false);
    expect(isInvalidCount(10)).toBe(false);
    expect(isInvalidCount(-1)).toBe(true);
    expect(isInvalidCount(2.25)).toBe(true);
  });

  it('requires a finite positive price', () => {
    expect(isInvalidPrice(12.99)).toBe(false);
    expect(isInvalidPrice(0)).toBe(true);
    expect(isInvalidPrice(-4)).toBe(true);
    expect(isInvalidPrice(Number.POSITIVE_INFINITY)).toBe(true);
  });

  it('treats blank strings as empty', () => {
    expect(isEmpty('Dune')).toBe(false);
    expect(isEmpty('')).toBe(true);
    expect(isEmpty('   ')).toBe(true);
    expect(isEmpty(null)).toBe(true);
    expect(isEmpty(undefined)).toBe(true);
  });
});
