import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_RECONCILE_CONFIG,
  buildReconcileConfig,
  getListTimeoutMs,
  parseExtraMappings,
} from '../src/config.js';

describe('list timeout', () => {
  it('uses the default when unset, empty, or invalid', () => {
    expect(getListTimeoutMs({})).toBe(60_000);
    expect(getListTimeoutMs({ ARCH_HM_LIST_TIMEOUT_MS: '   ' })).toBe(60_000);
    expect(getListTimeoutMs({ ARCH_HM_LIST_TIMEOUT_MS: 'soon' })).toBe(60_000);
  });

  it('clamps to sane bounds', () => {
    expect(getListTimeoutMs({ ARCH_HM_LIST_TIMEOUT_MS: '500' })).toBe(1_000);
    expect(getListTimeoutMs({ ARCH_HM_LIST_TIMEOUT_MS: '9999999' })).toBe(600_000);
  });

  it('accepts integer values and truncates numeric strings', () => {
    expect(getListTimeoutMs({ ARCH_HM_LIST_TIMEOUT_MS: '15000' })).toBe(15_000);
    expect(getListTimeoutMs({ ARCH_HM_LIST_TIMEOUT_MS: '2500.7' })).toBe(2_500);
  });
});

describe('extra name mappings', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('parses pairs separated by commas and whitespace', () => {
    expect(parseExtraMappings('foo=bar, baz=qux\nbad =x=y a=b=c')).toEqual({
      mappings: [
        ['foo', 'bar'],
        ['baz', 'qux'],
      ],
      invalid: ['bad', '=x=y', 'a=b=c'],
    });
    expect(parseExtraMappings('')).toEqual({ mappings: [], invalid: [] });
  });

  it('returns the default config when nothing is added', () => {
    expect(buildReconcileConfig({})).toBe(DEFAULT_RECONCILE_CONFIG);
  });

  it('adds to and overrides the default mapping without touching it', () => {
    const config = buildReconcileConfig({ ARCH_HM_EXTRA_MAPPINGS: 'zoom-us=zoom-bin,neovim-unwrapped=neovim' });
    expect(config.nameMapping.get('zoom-us')).toBe('zoom-bin');
    expect(config.nameMapping.get('neovim-unwrapped')).toBe('neovim');
    expect(config.nameMapping.get('yq-go')).toBe('go-yq');
    expect(config.protectedPackage).toBe('yay');
    expect(DEFAULT_RECONCILE_CONFIG.nameMapping.get('zoom-us')).toBe('zoom');
  });

  it('warns about malformed entries', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = buildReconcileConfig({ ARCH_HM_EXTRA_MAPPINGS: 'bad,foo=bar' });
    expect(config.nameMapping.get('foo')).toBe('bar');
    expect(warnSpy).toHaveBeenCalledWith('config.extra_mappings: ignoring malformed entries: bad');
  });
});
