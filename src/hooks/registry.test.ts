import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { HookRegistry, createSyncHookRegistry } from './registry.js';
import type { AutoHook, ManualHook } from './types.js';

describe('HookRegistry', () => {
  it('should return the registered callable unchanged', () => {
    const registry = new HookRegistry();
    const hook: AutoHook = () => 'CREATE EXTENSION IF NOT EXISTS citext';

    expect(registry.register('precreate-auto', 'orders', hook)).toBe(hook);
    expect(hook(undefined)).toBe('CREATE EXTENSION IF NOT EXISTS citext');
  });

  it('should keep registration order per database and kind', () => {
    const registry = new HookRegistry();
    const first: AutoHook = () => 'SELECT 1';
    const second: AutoHook = () => 'SELECT 2';

    registry.register('precreate-auto', 'orders', first);
    registry.register('precreate-auto', 'orders', second);

    expect(registry.get('precreate-auto', 'orders').map((entry) => entry.hook)).toEqual([first, second]);
    expect(registry.get('postcreate-auto', 'orders')).toEqual([]);
  });

  it('should return an empty list for unknown databases', () => {
    expect(new HookRegistry().get('precreate-manual', 'unknown')).toEqual([]);
  });

  it('should append duplicate registrations', () => {
    const registry = new HookRegistry();
    const hook: ManualHook = async () => {};

    registry.register('postcreate-manual', 'orders', hook);
    registry.register('postcreate-manual', 'orders', hook);

    expect(registry.get('postcreate-manual', 'orders')).toHaveLength(2);
  });

  it('should register one hook for several databases', () => {
    const registry = new HookRegistry();
    const hook: AutoHook = () => [];

    registry.register('postcreate-auto', ['orders', 'billing'], hook);

    expect(registry.get('postcreate-auto', 'orders')).toEqual([
      { kind: 'postcreate-auto', database: 'orders', hook },
    ]);
    expect(registry.get('postcreate-auto', 'billing')).toEqual([
      { kind: 'postcreate-auto', database: 'billing', hook },
    ]);
  });

  it('should reject registrations without a database name', () => {
    const registry = new HookRegistry();

    expect(() => registry.register('precreate-auto', [], () => [])).toThrow(
      new ConfigurationError('Cannot register precreate-auto hook without a database name')
    );
    expect(() => registry.register('precreate-auto', ['orders', ' '], () => [])).toThrow(
      'Cannot register precreate-auto hook for an empty database name'
    );
    expect(registry.get('precreate-auto', 'orders')).toEqual([]);
  });

  it('should expose decorator-style helpers per kind', () => {
    const registry = new HookRegistry();
    const auto = registry.precreate('orders')(() => 'SELECT 1');
    const manual = registry.postcreateManual(['orders'])(async () => {});

    expect(registry.get('precreate-auto', 'orders')[0]?.hook).toBe(auto);
    expect(registry.get('postcreate-manual', 'orders')[0]?.hook).toBe(manual);
  });

  it('should list databases with hooks and count them', () => {
    const registry = createSyncHookRegistry();
    registry.postcreate(['orders', 'billing'])(() => []);
    registry.precreateManual('audit')(() => {});
    registry.precreate('orders')(() => 'SELECT 1');

    expect(registry.databases()).toEqual(['audit', 'billing', 'orders']);
    expect(registry.count()).toBe(4);
    expect(registry.count('orders')).toBe(2);
  });
});
