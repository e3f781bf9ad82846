import { describe, it, expect, vi, beforeEach } from 'vitest';

const { debug } = vi.hoisted(() => ({ debug: vi.fn() }));

vi.mock('../../../logger.js', () => {
  const log = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: { ...log, child: () => log } };
});

import { ToolRegistry } from '../registry.js';
import type { ToolDefinition } from '../types.js';
import { ErrorCode } from '../../../utils/errors.js';

describe('Tool Registry', () => {
  it('should register and retrieve tools', () => {
    const registry = new ToolRegistry();

    const testTool: ToolDefinition = {
      name: 'test_tool',
      description: 'A test tool',
      parameters: [
        {
          name: 'input',
          type: 'string',
          description: 'Test input',
          required: true,
        },
      ],
      execute: async () => ({
        success: true,
        content: 'test result',
      }),
    };

    registry.register(testTool);
    expect(registry.has('test_tool')).toBe(true);
    expect(registry.get('test_tool')).toEqual(testTool);
  });

  it('should list and clear registered tools', () => {
    const registry = new ToolRegistry();

    registry.register({ name: 'tool1', description: 'Tool 1', parameters: [], execute: async () => ({ success: true, content: '' }) });
    registry.register({ name: 'tool2', description: 'Tool 2', parameters: [], execute: async () => ({ success: true, content: '' }) });

    expect(registry.getAll().map(t => t.name)).toEqual(['tool1', 'tool2']);

    registry.clear();
    expect(registry.getAll()).toEqual([]);
  });

  it('should convert tools to tool specs with an input schema', () => {
    const registry = new ToolRegistry();

    registry.register({
      name: 'search_course_content',
      description: 'Search course materials',
      parameters: [
        {
          name: 'query',
          type: 'string',
          description: 'Search query',
          required: true,
        },
        {
          name: 'lesson_number',
          type: 'integer',
          description: 'Lesson to search',
          required: false,
          default: 1,
        },
      ],
      execute: async () => ({ success: true, content: '' }),
    });

    expect(registry.toToolSpecs()).toEqual([
      {
        name: 'search_course_content',
        description: 'Search course materials',
        input_schema: {
          type: 'object',
          properties: {
            query: { type: 'string', description: 'Search query' },
            lesson_number: { type: 'integer', description: 'Lesson to search', default: 1 },
          },
          required: ['query'],
        },
      },
    ]);
  });

  it('should handle tool overwriting', () => {
    const registry = new ToolRegistry();

    registry.register({ name: 'tool', description: 'Version 1', parameters: [], execute: async () => ({ success: true, content: 'v1' }) });
    registry.register({ name: 'tool', description: 'Version 2', parameters: [], execute: async () => ({ success: true, content: 'v2' }) });

    expect(registry.getAll().length).toBe(1);
    expect(registry.get('tool')?.description).toBe('Version 2');
  });

  describe('execute', () => {
    beforeEach(() => {
      debug.mockClear();
    });

    it('returns the content of a successful tool', async () => {
      const registry = new ToolRegistry();
      registry.register({
        name: 'echo',
        description: 'Echo',
        parameters: [],
        execute: async args => ({ success: true, content: `echo: ${String(args.text)}` }),
      });

      await expect(registry.execute('echo', { text: 'hi' })).resolves.toBe('echo: hi');
    });

    it('logs the metadata a tool reports', async () => {
      const registry = new ToolRegistry();
      registry.register({
        name: 'counted',
        description: 'Reports hits',
        parameters: [],
        execute: async () => ({ success: true, content: 'two hits', metadata: { hits: 2 } }),
      });

      await registry.execute('counted', {});

      expect(debug).toHaveBeenCalledTimes(1);
      expect(debug).toHaveBeenCalledWith(
        expect.objectContaining({ tool: 'counted', success: true, metadata: { hits: 2 } }),
        'tool executed',
      );
    });

    it('rejects unknown tools', async () => {
      const registry = new ToolRegistry();

      await expect(registry.execute('nope', {})).rejects.toMatchObject({
        code: ErrorCode.TOOL_NOT_FOUND,
        message: "Tool 'nope' not found",
      });
    });

    it('rejects with the tool content when the tool reports failure', async () => {
      const registry = new ToolRegistry();
      registry.register({
        name: 'fails',
        description: 'Fails',
        parameters: [],
        execute: async () => ({ success: false, content: "No course found matching 'Cooking'" }),
      });

      await expect(registry.execute('fails', {})).rejects.toMatchObject({
        code: ErrorCode.TOOL_FAILED,
        message: "No course found matching 'Cooking'",
      });
    });

    it('times out tools that never settle', async () => {
      const registry = new ToolRegistry(10);
      registry.register({
        name: 'stuck',
        description: 'Never resolves',
        parameters: [],
        execute: () => new Promise(() => {}),
      });

      await expect(registry.execute('stuck', {})).rejects.toThrow('Tool "stuck" timed out after 10ms');
    });
  });
});
