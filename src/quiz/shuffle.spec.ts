import { shuffle } from './shuffle';

describe('shuffle', () => {
  it('should return a permutation without touching the input', () => {
    const input = Object.freeze(['a', 'b', 'c', 'd', 'e']);

    const result = shuffle(input);

    expect([...result].sort()).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(input).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('should follow the random source', () => {
    expect(shuffle(['a', 'b', 'c'], () => 0.999999)).toEqual(['a', 'b', 'c']);
    expect(shuffle(['a', 'b', 'c'], () => 0)).toEqual(['b', 'c', 'a']);
  });
});
