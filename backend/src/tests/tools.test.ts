import { describe, expect, it } from 'vitest';

import { invokeTool } from '../tools/invoke.js';
import { ToolRegistry } from '../tools/registry.js';
import { ProviderUnavailableError, ToolExecutionError } from '../utils/errors.js';
import { FakeToolProvider, hangingTool } from './fakes.js';

describe('ToolRegistry', () => {
  it('registers only listed tools that have an argument schema', async () => {
    const provider = new FakeToolProvider({
      get_production_metrics: () => ({}),
      custom_tool: () => ({})
    });

    const registry = await ToolRegistry.fromProvider(provider);

    expect(registry.names()).toEqual(['get_production_metrics']);
    expect(registry.has('custom_tool')).toBe(false);
  });

  it('rejects unknown tools without touching the provider', () => {
    const provider = new FakeToolProvider({ find_bottleneck: () => ({}) });
    const registry = new ToolRegistry(provider, provider.descriptors());

    expect(registry.validate('delete_everything', {})).toEqual({ ok: false, error: 'Unknown tool: delete_everything' });
    expect(provider.calls).toHaveLength(0);
  });

  it('drops unknown argument keys', () => {
    const provider = new FakeToolProvider({ get_station: () => ({}) });
    const registry = new ToolRegistry(provider, provider.descriptors());

    expect(registry.validate('get_station', { station_id: 'ST001', verbose: true })).toEqual({
      ok: true,
      args: { station_id: 'ST001' }
    });
  });

  it('reports a missing required argument by path', () => {
    const provider = new FakeToolProvider({ get_station: () => ({}) });
    const registry = new ToolRegistry(provider, provider.descriptors());

    expect(registry.validate('get_station', {})).toEqual({ ok: false, error: 'station_id: Required' });
  });

  it('applies and coerces the run limit', () => {
    const provider = new FakeToolProvider({ get_recent_runs: () => [] });
    const registry = new ToolRegistry(provider, provider.descriptors());

    expect(registry.validate('get_recent_runs', undefined)).toEqual({ ok: true, args: { limit: 5 } });
    expect(registry.validate('get_recent_runs', { limit: '20' })).toEqual({ ok: true, args: { limit: 20 } });

    const tooSmall = registry.validate('get_recent_runs', { limit: 0 });
    expect(tooSmall.ok).toBe(false);
    if (!tooSmall.ok) {
      expect(tooSmall.error).toBe('limit: Number must be greater than or equal to 1');
    }
  });

  it('rejects a status outside the station states', () => {
    const provider = new FakeToolProvider({ get_stations_by_status: () => [] });
    const registry = new ToolRegistry(provider, provider.descriptors());

    const result = registry.validate('get_stations_by_status', { status: 'broken' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatch(/^status: Invalid enum value/);
    }
  });
});

describe('invokeTool', () => {
  it('returns the tool payload on success', async () => {
    const provider = new FakeToolProvider({ get_production_metrics: () => ({ units: 120 }) });
    const registry = new ToolRegistry(provider, provider.descriptors());

    const result = await invokeTool(registry, 'get_production_metrics', {});

    expect(result.toolName).toBe('get_production_metrics');
    expect(result.success).toBe(true);
    expect(result.data).toEqual({ units: 120 });
    expect(result.error).toBe('');
    expect(result.executionTimeMs).toBeGreaterThanOrEqual(0);
  });

  it('times out and aborts the pending call', async () => {
    let aborted = false;
    const hang = hangingTool();
    const provider = new FakeToolProvider({
      get_production_metrics: (args, options) => {
        options.signal?.addEventListener('abort', () => {
          aborted = true;
        });
        return hang(args, options);
      }
    });
    const registry = new ToolRegistry(provider, provider.descriptors());

    const result = await invokeTool(registry, 'get_production_metrics', {}, { timeoutMs: 20 });

    expect(result.success).toBe(false);
    expect(result.data).toBeNull();
    expect(result.error).toBe('Tool call timed out after 0.02 seconds');
    expect(aborted).toBe(true);
  });

  it('turns tool errors into an unsuccessful result', async () => {
    const provider = new FakeToolProvider({
      get_station: () => {
        throw new ToolExecutionError('Station ST009 not found');
      }
    });
    const registry = new ToolRegistry(provider, provider.descriptors());

    const result = await invokeTool(registry, 'get_station', { station_id: 'ST009' });

    expect(result).toMatchObject({ success: false, data: null, error: 'Station ST009 not found' });
  });

  it('rethrows provider unavailability', async () => {
    const provider = new FakeToolProvider({
      find_bottleneck: async () => {
        throw new ProviderUnavailableError('Tool server disconnected');
      }
    });
    const registry = new ToolRegistry(provider, provider.descriptors());

    await expect(invokeTool(registry, 'find_bottleneck', {})).rejects.toBeInstanceOf(ProviderUnavailableError);
  });
});
