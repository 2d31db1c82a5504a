import { beforeEach, describe, expect, it, vi } from 'vitest';

const sdk = vi.hoisted(() => ({
  connect: vi.fn(),
  listTools: vi.fn(),
  callTool: vi.fn(),
  close: vi.fn()
}));

vi.mock('@modelcontextprotocol/sdk/client/index.js', () => ({
  Client: class {
    onerror?: (error: Error) => void;
    connect = sdk.connect;
    listTools = sdk.listTools;
    callTool = sdk.callTool;
    close = sdk.close;
  }
}));

vi.mock('@modelcontextprotocol/sdk/client/stdio.js', () => ({
  StdioClientTransport: class {
    constructor(readonly params: unknown) {}
  }
}));

const { McpToolClient } = await import('../tools/mcpClient.js');
const { ProviderUnavailableError, ToolExecutionError } = await import('../utils/errors.js');

function createClient() {
  return new McpToolClient({ transport: { type: 'stdio', command: 'line-server', args: [] } });
}

describe('McpToolClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    sdk.connect.mockResolvedValue(undefined);
    sdk.close.mockResolvedValue(undefined);
  });

  it('refuses calls before connecting', async () => {
    await expect(createClient().call('find_bottleneck', {})).rejects.toBeInstanceOf(ProviderUnavailableError);
  });

  it('reports a failed connection as provider unavailability', async () => {
    sdk.connect.mockRejectedValueOnce(new Error('spawn line-server ENOENT'));

    await expect(createClient().connect()).rejects.toThrow(
      'Unable to connect to MCP server: spawn line-server ENOENT'
    );
  });

  it('connects once', async () => {
    const client = createClient();

    await client.connect();
    await client.connect();

    expect(sdk.connect).toHaveBeenCalledTimes(1);
  });

  it('lists tools as descriptors', async () => {
    sdk.listTools.mockResolvedValueOnce({
      tools: [{ name: 'find_bottleneck', inputSchema: { type: 'object', properties: {} } }]
    });
    const client = createClient();
    await client.connect();

    expect(await client.list()).toEqual([
      { name: 'find_bottleneck', description: '', inputSchema: { type: 'object', properties: {} } }
    ]);
  });

  it('decodes JSON text content', async () => {
    sdk.callTool.mockResolvedValueOnce({ content: [{ type: 'text', text: '{"units":120}' }] });
    const client = createClient();
    await client.connect();

    expect(await client.call('get_production_metrics', {})).toEqual({ units: 120 });
  });

  it('returns plain text as is', async () => {
    sdk.callTool.mockResolvedValueOnce({ content: [{ type: 'text', text: 'Line is running' }] });
    const client = createClient();
    await client.connect();

    expect(await client.call('get_station_status', { station_id: 'ST001' })).toBe('Line is running');
  });

  it('raises tool-reported errors', async () => {
    sdk.callTool.mockResolvedValueOnce({ content: [{ type: 'text', text: 'Station ST009 not found' }], isError: true });
    const client = createClient();
    await client.connect();

    const call = client.call('get_station', { station_id: 'ST009' });
    await expect(call).rejects.toBeInstanceOf(ToolExecutionError);
    await expect(call).rejects.toThrow('Station ST009 not found');
  });

  it('closes the session', async () => {
    const client = createClient();
    await client.connect();

    await client.close();

    expect(sdk.close).toHaveBeenCalledTimes(1);
    await expect(client.list()).rejects.toBeInstanceOf(ProviderUnavailableError);
  });
});
