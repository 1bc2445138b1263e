import { describe, expect, it } from 'vitest';

import {
  hasHttpScheme,
  normalizeTargetUrl,
  targetKeyFromUrl,
  toMonitoredTarget,
} from '../src/monitor/targets';

describe('normalizeTargetUrl', () => {
  it('prefixes https:// when no scheme is present', () => {
    expect(normalizeTargetUrl('example.com')).toBe('https://example.com');
    expect(normalizeTargetUrl(' example.com/health ')).toBe('https://example.com/health');
  });

  it('keeps explicit http and https schemes', () => {
    expect(normalizeTargetUrl('http://example.com')).toBe('http://example.com');
    expect(normalizeTargetUrl('HTTPS://example.com')).toBe('HTTPS://example.com');
  });

  it('only recognises http(s) as a scheme', () => {
    expect(hasHttpScheme('ftp://example.com')).toBe(false);
    expect(normalizeTargetUrl('ftp://example.com')).toBe('https://ftp://example.com');
  });
});

describe('targetKeyFromUrl', () => {
  it('uses the host with the scheme stripped', () => {
    expect(targetKeyFromUrl('example.com')).toBe('example.com');
    expect(targetKeyFromUrl('https://bad.example.com')).toBe('bad.example.com');
    expect(targetKeyFromUrl('http://status.example.com/health?deep=1')).toBe('status.example.com');
  });

  it('replaces port separators with underscores', () => {
    expect(targetKeyFromUrl('https://example.com:8443/health')).toBe('example.com_8443');
    expect(targetKeyFromUrl('localhost:3000')).toBe('localhost_3000');
  });

  it('gives URLs on the same host the same key', () => {
    expect(targetKeyFromUrl('https://example.com/a')).toBe(targetKeyFromUrl('example.com/b'));
  });

  it('builds monitored targets that keep the configured url verbatim', () => {
    expect(toMonitoredTarget('example.com/health')).toEqual({
      url: 'example.com/health',
      key: 'example.com',
    });
  });
});
