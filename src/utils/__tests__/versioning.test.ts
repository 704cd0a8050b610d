import { compareVersions, extractVersion, isNewerVersion, parseVersion } from '../versioning';

const token = (raw: string) => {
  const parsed = parseVersion(raw);
  if (!parsed) {
    throw new Error(`test fixture ${raw} is not a valid version`);
  }
  return parsed;
};

describe('extractVersion', () => {
  it('returns the token after the underscore', () => {
    const result = extractVersion('plugin_1.2.0.wasm');

    expect(result).toMatchObject({ matched: true, family: 'plugin' });
    expect(result.matched && result.version.raw).toBe('1.2.0');
  });

  it('splits on the last underscore when the family name has several', () => {
    const result = extractVersion('my_cool_app_2.0.0.bin');

    expect(result.matched).toBe(true);
    if (result.matched) {
      expect(result.family).toBe('my_cool_app');
      expect(result.version.raw).toBe('2.0.0');
    }
  });

  it('handles hyphenated family names', () => {
    const result = extractVersion('five-second-delay_1.2.0.wasm');

    expect(result.matched && result.family).toBe('five-second-delay');
    expect(result.matched && result.version.raw).toBe('1.2.0');
  });

  it('keeps pre-release and build suffixes in the raw token', () => {
    const result = extractVersion('plugin_1.3.0-rc.1+build.7.wasm');

    expect(result.matched && result.version.raw).toBe('1.3.0-rc.1+build.7');
  });

  it('rejects names without an underscore', () => {
    expect(extractVersion('plugin-1.2.0.wasm')).toEqual({ matched: false, reason: 'no-separator' });
    expect(extractVersion('README.md')).toEqual({ matched: false, reason: 'no-separator' });
  });

  it('ignores underscores that only appear in the extension', () => {
    expect(extractVersion('plugin.tar_gz')).toEqual({ matched: false, reason: 'no-separator' });
  });

  it('rejects an empty family name', () => {
    expect(extractVersion('_1.0.0.wasm')).toEqual({ matched: false, reason: 'empty-family' });
  });

  it('rejects tokens that are not semantic versions', () => {
    expect(extractVersion('plugin_latest.wasm')).toEqual({ matched: false, reason: 'invalid-version' });
    expect(extractVersion('plugin_1.2.wasm')).toEqual({ matched: false, reason: 'invalid-version' });
    expect(extractVersion('plugin_.wasm')).toEqual({ matched: false, reason: 'invalid-version' });
  });
});

describe('version ordering', () => {
  it('compares numerically rather than lexicographically', () => {
    expect(isNewerVersion(token('10.0.0'), token('9.0.0'))).toBe(true);
    expect(isNewerVersion(token('1.10.0'), token('1.9.3'))).toBe(true);
  });

  it('orders pre-releases before the release', () => {
    expect(compareVersions(token('2.0.0-beta.1'), token('2.0.0'))).toBeLessThan(0);
    expect(compareVersions(token('2.0.0-alpha'), token('2.0.0-beta'))).toBeLessThan(0);
  });

  it('ignores build metadata', () => {
    expect(compareVersions(token('1.0.0+build.1'), token('1.0.0'))).toBe(0);
    expect(isNewerVersion(token('1.0.0+build.2'), token('1.0.0+build.1'))).toBe(false);
  });

  it('treats equal versions as not newer', () => {
    expect(isNewerVersion(token('2.0.0'), token('2.0.0'))).toBe(false);
  });
});

describe('parseVersion', () => {
  it('returns null for garbage', () => {
    expect(parseVersion('not-a-version')).toBeNull();
    expect(parseVersion('')).toBeNull();
  });

  it('keeps the raw string', () => {
    expect(parseVersion('v1.4.0')?.raw).toBe('v1.4.0');
    expect(parseVersion('v1.4.0')?.parsed.version).toBe('1.4.0');
  });
});
