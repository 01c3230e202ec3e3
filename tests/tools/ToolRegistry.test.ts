import { describe, it, expect, beforeEach } from 'vitest';
import { ToolRegistry } from '../../src/tools/ToolRegistry.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { ConfigurationError } from '../../src/errors.js';
import type { ITool, ToolOutcome } from '../../src/tools/ITool.js';
import type { ToolDefinition } from '../../src/types/llm.js';

class EchoTool implements ITool {
  readonly definition: ToolDefinition;
  calls: Array<Record<string, unknown>> = [];

  constructor(name: string, private readonly url: string | null = null) {
    this.definition = {
      name,
      description: `Echoes for ${name}`,
      inputSchema: { text: { type: 'string', required: true } },
    };
  }

  async execute(args: Record<string, unknown>): Promise<ToolOutcome> {
    this.calls.push(args);
    const text = String(args.text);
    return { text: `${this.definition.name}: ${text}`, sources: [{ text, url: this.url }] };
  }
}

class FailingTool implements ITool {
  readonly definition: ToolDefinition = {
    name: 'failing',
    description: 'Always throws',
    inputSchema: {},
  };

  async execute(): Promise<ToolOutcome> {
    throw new Error('database offline');
  }
}

describe('ToolRegistry', () => {
  let logProvider: ConsoleLogProvider;
  let registry: ToolRegistry;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    registry = new ToolRegistry(logProvider);
  });

  describe('register', () => {
    it('should expose definitions in registration order', () => {
      const a = new EchoTool('alpha');
      const b = new EchoTool('beta');
      registry.register(a);
      registry.register(b);

      expect(registry.definitions()).toEqual([a.definition, b.definition]);
      expect(registry.has('alpha')).toBe(true);
      expect(registry.has('gamma')).toBe(false);
    });

    it('should replace a tool registered under the same name', () => {
      const first = new EchoTool('alpha', 'first');
      const second = new EchoTool('alpha', 'second');
      registry.register(first);
      registry.register(second);

      expect(registry.definitions()).toEqual([second.definition]);
    });

    it('should reject a tool without a name', () => {
      const nameless = new EchoTool('');

      expect(() => registry.register(nameless)).toThrow(ConfigurationError);
      expect(() => registry.register(nameless)).toThrow("Tool must have a 'name' in its definition");
    });
  });

  describe('dispatch', () => {
    it('should run the named tool with the given arguments', async () => {
      const tool = new EchoTool('alpha');
      registry.register(tool);

      const text = await registry.dispatch('alpha', { text: 'hi' });

      expect(text).toBe('alpha: hi');
      expect(tool.calls).toEqual([{ text: 'hi' }]);
    });

    it('should report an unknown tool as text', async () => {
      const text = await registry.dispatch('missing', {});

      expect(text).toBe("Tool 'missing' not found");
      expect(logProvider.events.at(-1)?.message).toBe('Model requested unknown tool');
    });

    it('should report a throwing tool as text and log it', async () => {
      registry.register(new FailingTool());

      const text = await registry.dispatch('failing', {});

      expect(text).toBe("Tool 'failing' failed: database offline");
      const event = logProvider.events.at(-1);
      expect(event?.level).toBe('error');
      expect(event?.fields).toEqual({ tool: 'failing', error: 'database offline' });
    });
  });

  describe('sources', () => {
    it('should collect sources in tool registration order', async () => {
      registry.register(new EchoTool('alpha', 'https://a'));
      registry.register(new EchoTool('beta', 'https://b'));

      await registry.dispatch('beta', { text: 'second' });
      await registry.dispatch('alpha', { text: 'first' });

      expect(registry.drainSources()).toEqual([
        { text: 'first', url: 'https://a' },
        { text: 'second', url: 'https://b' },
      ]);
    });

    it('should keep only the latest execution per tool', async () => {
      registry.register(new EchoTool('alpha'));

      await registry.dispatch('alpha', { text: 'one' });
      await registry.dispatch('alpha', { text: 'two' });

      expect(registry.drainSources()).toEqual([{ text: 'two', url: null }]);
    });

    it('should empty sources on clear', async () => {
      registry.register(new EchoTool('alpha'));
      await registry.dispatch('alpha', { text: 'one' });

      registry.clearSources();

      expect(registry.drainSources()).toEqual([]);
    });

    it('should isolate sources between runs', async () => {
      registry.register(new EchoTool('alpha'));
      const first = registry.openRun();
      const second = registry.openRun();

      await first.dispatch('alpha', { text: 'from first' });
      await second.dispatch('alpha', { text: 'from second' });

      expect(first.drainSources()).toEqual([{ text: 'from first', url: null }]);
      expect(second.drainSources()).toEqual([{ text: 'from second', url: null }]);
      expect(registry.drainSources()).toEqual([]);
    });

    it('should leave sources untouched when a tool fails', async () => {
      registry.register(new EchoTool('alpha'));
      registry.register(new FailingTool());

      await registry.dispatch('alpha', { text: 'kept' });
      await registry.dispatch('failing', {});

      expect(registry.drainSources()).toEqual([{ text: 'kept', url: null }]);
    });
  });
});
