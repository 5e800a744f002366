import fs from 'fs';
import path from 'path';
import { BUILT_IN_TOOLS, createLineHandler, registerBuiltInTools } from '../../../src/mcpServer/server';
import { Dispatcher } from '../../../src/mcpServer/dispatcher/Dispatcher';
import { ToolRegistry } from '../../../src/mcpServer/tools/ToolRegistry';
import type { JsonRpcResponse } from '../../../src/mcpServer/parser/Parser';
import Logger from '../../../src/mcpServer/logger';

describe('MCP server line handling', () => {
  let sent: JsonRpcResponse[];
  let handleLine: (line: string) => Promise<void>;

  beforeEach(async () => {
    Logger.enableMemoryHook();
    const registry = new ToolRegistry();
    await registerBuiltInTools(registry);
    sent = [];
    handleLine = createLineHandler(new Dispatcher(registry), response => sent.push(response));
  });

  afterEach(() => {
    Logger.disableMemoryHook();
  });

  it('registers every built-in tool', async () => {
    await handleLine('{"jsonrpc":"2.0","id":1,"method":"tools/list"}');
    const body = JSON.parse(JSON.stringify(sent[0].result));
    const names = body.tools.map((t: { name: string }) => t.name);
    expect(names).toEqual(BUILT_IN_TOOLS.map(t => t.meta.name));
    expect(names).toEqual([
      'gantt.schema.resolve',
      'gantt.workbook.inspect',
      'gantt.workbook.createSample',
      'gantt.chart.plan',
      'gantt.colors.listColormaps',
      'gantt.colors.generate',
      'gantt.themes.list',
      'gantt.themes.get',
      'gantt.themes.save',
      'gantt.themes.delete',
      'gantt.settings.get',
      'gantt.settings.save',
    ]);
  });

  it('answers a tool call end to end', async () => {
    await handleLine(JSON.stringify({
      jsonrpc: '2.0',
      id: 'r1',
      method: 'tools/call',
      params: { name: 'gantt.schema.resolve', arguments: { columns: ['Task', 'Start', 'End'] } },
    }));
    expect(sent).toHaveLength(1);
    expect(sent[0].id).toBe('r1');
    const text = JSON.parse(JSON.stringify(sent[0].result)).content[0].text;
    expect(JSON.parse(text).mapping).toEqual({ task: 'Task', start_date: 'Start', end_date: 'End' });
  });

  it('returns -32602 for invalid tool arguments', async () => {
    await handleLine('{"jsonrpc":"2.0","id":2,"method":"tools/call","params":{"name":"gantt.chart.plan","arguments":{}}}');
    expect(sent[0].error).toEqual({ code: -32602, message: 'Invalid params: either path or table is required', data: undefined });
  });

  it('answers a malformed request that carries an id with -32600', async () => {
    await handleLine('{"jsonrpc":"1.0","id":7,"method":"ping"}');
    expect(sent).toEqual([{ jsonrpc: '2.0', id: 7, error: { code: -32600, message: 'Invalid Request' } }]);
  });

  it('stays silent for unparsable lines, blank lines and notifications', async () => {
    await handleLine('{oops');
    await handleLine('   ');
    await handleLine('{"jsonrpc":"2.0","method":"notifications/initialized"}');
    expect(sent).toEqual([]);
    expect(Logger.getMemory().filter(r => r.level === 'error')).toHaveLength(1);
  });
});

describe('MCP server entry point', () => {
  it('starts with a node shebang so the bin entry runs directly', () => {
    const source = fs.readFileSync(path.join(__dirname, '../../../src/mcpServer/index.ts'), 'utf8');
    expect(source.split('\n')[0]).toBe('#!/usr/bin/env node');
  });
});
