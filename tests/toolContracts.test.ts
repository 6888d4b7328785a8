import { describe, it, expect } from 'vitest';
import { TOOL_SPECS, getTools } from '../src/tools/registry.js';

describe('GNSS STA tool contracts', () => {
  it('all tools have valid names', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.name).toMatch(/^sta_/);
    }
  });

  it('all tools have descriptions', () => {
    for (const spec of TOOL_SPECS) {
      expect(spec.description.length).toBeGreaterThan(10);
    }
  });

  it('getTools returns valid MCP tool definitions', () => {
    const tools = getTools('standard');
    const standardCount = TOOL_SPECS.filter(spec => spec.exposure === 'standard').length;
    expect(tools.length).toBe(standardCount);
    for (const tool of tools) {
      expect(tool.name).toBeDefined();
      expect(tool.description).toBeDefined();
      expect(tool.inputSchema).toBeDefined();
      expect(tool.inputSchema.type).toBe('object');
      expect(tool.inputSchema.$schema).toBeUndefined();
    }
  });

  it('all tool names are unique', () => {
    const names = TOOL_SPECS.map(s => s.name);
    expect(new Set(names).size).toBe(names.length);
  });

  it('standard tools include sta_write_file', () => {
    const tools = getTools('standard');
    expect(tools.some(t => t.name === 'sta_write_file')).toBe(true);
  });

  it('sta_write_file requires an output path', () => {
    const tool = getTools('standard').find(t => t.name === 'sta_write_file');
    expect(tool?.inputSchema.required).toEqual(['output']);
  });

  it('expected tool count', () => {
    expect(TOOL_SPECS.length).toBe(6);
  });

  it('expected standard-mode tool count', () => {
    expect(getTools('standard').length).toBe(5);
    expect(getTools('full').map(t => t.name)).toContain('sta_normalize_date');
  });
});
