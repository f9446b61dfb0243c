import { gravatarUrl } from '../gravatar';

describe('gravatarUrl', () => {
  it('hashes the trimmed, lower-cased email', () => {
    expect(gravatarUrl('  Ann.Lee@Example.com ')).toBe(
      'https://www.gravatar.com/avatar/ac22d1dff811ced3068af057a3ed7029?d=identicon',
    );
  });
});
