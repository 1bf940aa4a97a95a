import * as crypto from 'crypto';
import { basicAuthorization, DigestAuthSession, isDigestChallenge, parseWwwAuthenticate } from '../wattbox/digest_auth';

const md5 = (value: string) => crypto.createHash('md5').update(value).digest('hex');

describe('HTTP authentication headers', () => {
  test('builds a Basic header', () => {
    expect(basicAuthorization('admin', 'test-secret')).toBe('Basic YWRtaW46dGVzdC1zZWNyZXQ=');
  });

  test('detects Digest challenges regardless of case', () => {
    expect(isDigestChallenge('DIGEST realm="x"')).toBe(true);
    expect(isDigestChallenge('Basic realm="x"')).toBe(false);
    expect(isDigestChallenge(null)).toBe(false);
  });

  test('reads the Digest challenge out of a multi-scheme header', () => {
    const challenge = parseWwwAuthenticate('Basic realm="basic-realm", Digest realm="digest-realm", nonce="n1", algorithm=MD5-sess');

    expect(challenge).toEqual({
      realm: 'digest-realm',
      nonce: 'n1',
      qop: undefined,
      opaque: undefined,
      algorithm: 'MD5-sess',
    });
  });

  test('prefers qop=auth when several are offered', () => {
    expect(parseWwwAuthenticate('Digest realm="r", nonce="n", qop="auth-int,auth"').qop).toBe('auth');
  });

  test('matches the RFC 2617 worked response', () => {
    const session = new DigestAuthSession('Mufasa', 'Circle Of Life', () => '0a4f113b');
    const primed = session.prime(
      'Digest realm="testrealm@host.com", qop="auth,auth-int", nonce="dcd98b7102dd2f0e8b11d0f600bfb0c093", opaque="5ccc069c403ebaf9f0171e9517f40e41"',
    );

    expect(primed).toBe(true);
    expect(session.buildHeader('GET', '/dir/index.html')).toBe(
      'Digest username="Mufasa", realm="testrealm@host.com", nonce="dcd98b7102dd2f0e8b11d0f600bfb0c093", ' +
      'uri="/dir/index.html", response="6629fae49393a05397450978507c4ef1", qop=auth, nc=00000001, ' +
      'cnonce="0a4f113b", opaque="5ccc069c403ebaf9f0171e9517f40e41"',
    );
  });

  test('increments the nonce count per request', () => {
    const session = new DigestAuthSession('admin', 'test-secret', () => 'c0ffee');
    session.prime('Digest realm="WattBox", qop="auth", nonce="abc"');

    session.buildHeader('GET', '/main');
    expect(session.buildHeader('GET', '/outlet/on?o=1')).toContain('nc=00000002');
  });

  test('uses the legacy response form when no qop is offered', () => {
    const session = new DigestAuthSession('admin', 'test-secret');
    session.prime('Digest realm="WattBox", nonce="abc"');

    const ha1 = md5('admin:WattBox:test-secret');
    const ha2 = md5('GET:/main');
    const header = session.buildHeader('GET', '/main');

    expect(header).toContain(`response="${md5(`${ha1}:abc:${ha2}`)}"`);
    expect(header).not.toContain('qop=');
  });

  test.each([
    ['MD5-sess', 'md5', true],
    ['SHA-256', 'sha256', false],
    ['SHA-256-sess', 'sha256', true],
  ])('computes %s responses and echoes the algorithm as offered', (algorithm, hashName, sess) => {
    const hash = (value: string) => crypto.createHash(hashName).update(value).digest('hex');
    const session = new DigestAuthSession('admin', 'test-secret', () => 'c0ffee');
    session.prime(`Digest realm="WattBox", qop="auth", nonce="abc", algorithm=${algorithm}`);

    const baseHa1 = hash('admin:WattBox:test-secret');
    const ha1 = sess ? hash(`${baseHa1}:abc:c0ffee`) : baseHa1;
    const ha2 = hash('GET:/outlet/on?o=1');
    const header = session.buildHeader('GET', '/outlet/on?o=1');

    expect(header).toContain(`response="${hash(`${ha1}:abc:00000001:c0ffee:auth:${ha2}`)}"`);
    expect(header).toContain(`algorithm=${algorithm},`);
  });

  test('ignores Basic challenges', () => {
    const session = new DigestAuthSession('admin', 'test-secret');

    expect(session.prime('Basic realm="WattBox"')).toBe(false);
    expect(session.isPrimed).toBe(false);
    expect(() => session.buildHeader('GET', '/main')).toThrow('Digest session has not received a challenge');
  });

  test('refuses algorithms it cannot compute', () => {
    const session = new DigestAuthSession('admin', 'test-secret');

    expect(() => session.prime('Digest realm="r", nonce="n", algorithm=SHA-512-256')).toThrow('Unsupported digest algorithm: SHA-512-256');
  });
});
