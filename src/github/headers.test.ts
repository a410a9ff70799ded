import { GITHUB_ACCEPT_HEADER, buildRequestHeaders, headersMatch } from './headers';

describe('buildRequestHeaders', () => {
  it('uses the token scheme and the v3 media type', () => {
    expect(buildRequestHeaders('test-token')).toEqual({
      Authorization: 'token test-token',
      Accept: GITHUB_ACCEPT_HEADER,
    });
  });
});

describe('headersMatch', () => {
  const expected = buildRequestHeaders('test-token');

  it('accepts identical headers in any key order', () => {
    expect(headersMatch({ Accept: GITHUB_ACCEPT_HEADER, Authorization: 'token test-token' }, expected)).toBe(true);
  });

  it('rejects a different value', () => {
    expect(headersMatch({ ...expected, Authorization: 'Bearer test-token' }, expected)).toBe(false);
  });

  it('rejects extra or missing keys', () => {
    expect(headersMatch({ ...expected, 'User-Agent': 'x' }, expected)).toBe(false);
    expect(headersMatch({ Authorization: 'token test-token' }, expected)).toBe(false);
  });
});
