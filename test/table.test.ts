import { tabulate } from '../src/utils/table';

describe('tabulate', () => {
  test('pads columns to the widest cell', () => {
    expect(tabulate(['a', 'bb'], [['xxx', 'y']])).toBe(['a   | bb', '----+---', 'xxx | y'].join('\n'));
  });

  test('treats missing cells as empty', () => {
    expect(tabulate(['name', 'x'], [['al']])).toBe(['name | x', '-----+--', 'al   |'].join('\n'));
  });
});
