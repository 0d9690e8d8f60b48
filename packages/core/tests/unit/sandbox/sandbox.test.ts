import { afterEach, describe, expect, it } from 'vitest';
import { IsolateSandbox } from '../../../src/sandbox/sandbox.js';
import type { SandboxOptions } from '../../../src/sandbox/sandbox.js';
import { SandboxError } from '../../../src/utils/errors.js';

const open: IsolateSandbox[] = [];

async function sandbox(overrides: Partial<SandboxOptions> = {}): Promise<IsolateSandbox> {
  const created = await IsolateSandbox.create({
    context: 'hello',
    depth: 0,
    maxRecursionDepth: 1,
    memoryLimitMb: 64,
    ...overrides,
  });
  open.push(created);
  return created;
}

afterEach(() => {
  for (const s of open.splice(0)) s.dispose();
});

describe('IsolateSandbox', () => {
  describe('execute', () => {
    it('captures printed lines', async () => {
      const box = await sandbox();
      const result = await box.execute("print('a'); print(1, { x: 2 }); console.log([true, null]);");
      expect(result.output).toBe('a\n1 {"x":2}\n[true,null]\n');
      expect(result.error).toBeUndefined();
      expect(result.fault).toBeUndefined();
    });

    it('binds the context string', async () => {
      const box = await sandbox({ context: 'hello' });
      const result = await box.execute('print(context.length, context.toUpperCase());');
      expect(result.output).toBe('5 HELLO\n');
    });

    it('binds a list context as an array', async () => {
      const box = await sandbox({ context: ['a', 'b'] });
      const result = await box.execute('print(context.length, context[1]);');
      expect(result.output).toBe('2 b\n');
    });

    it('keeps bindings between executions', async () => {
      const box = await sandbox();
      await box.execute('var total = 3; let factor = 2;');
      const result = await box.execute('total += 4; print(total * factor);');
      expect(result.output).toBe('14\n');
    });

    it('reports runtime errors with the output produced before them', async () => {
      const box = await sandbox();
      const result = await box.execute("print('before'); notDefinedAnywhere();");
      expect(result.output).toBe('before\n');
      expect(result.error).toMatch(/notDefinedAnywhere is not defined/);
    });

    it('reports syntax errors', async () => {
      const box = await sandbox();
      const result = await box.execute('var = ;');
      expect(result.output).toBe('');
      expect(result.error).toBeDefined();
    });

    it('stops runaway code at the timeout and stays usable', async () => {
      const box = await sandbox({ timeoutMs: 100 });
      const stuck = await box.execute('while (true) {}');
      expect(stuck.error).toBeDefined();
      const next = await box.execute('print(1);');
      expect(next.output).toBe('1\n');
    });

    it('rebuilds the isolate after the memory limit is hit', async () => {
      const box = await sandbox({ memoryLimitMb: 16, timeoutMs: 10_000 });
      await box.execute('var keep = 1;');

      const blown = await box.execute("var hog = []; while (true) hog.push('x'.repeat(1024) + hog.length);");
      expect(blown.error).toContain('The namespace was reset: only context is bound.');

      const next = await box.execute('print(context);');
      expect(next.output).toBe('hello\n');
      expect(next.error).toBeUndefined();
      expect(await box.getVariable('keep')).toBeUndefined();
    });

    it('has no access to host modules', async () => {
      const box = await sandbox();
      const result = await box.execute("print(typeof require, typeof process, typeof fetch);");
      expect(result.output).toBe('undefined undefined undefined\n');
    });
  });

  describe('llm_query', () => {
    it('calls the host query function synchronously', async () => {
      const prompts: string[] = [];
      const box = await sandbox({
        onQuery: async (prompt) => {
          prompts.push(prompt);
          return `echo:${prompt}`;
        },
      });
      const result = await box.execute("var reply = llm_query('hi'); print(reply);");
      expect(result.output).toBe('echo:hi\n');
      expect(prompts).toEqual(['hi']);
      expect(box.subCallsAllowed).toBe(true);
    });

    it('is withheld when a sub-call would exceed the recursion limit', async () => {
      const box = await sandbox({ depth: 1, maxRecursionDepth: 1, onQuery: async () => 'unused' });
      const result = await box.execute("llm_query('x');");
      expect(box.subCallsAllowed).toBe(false);
      expect(result.error).toContain(
        'llm_query is unavailable at recursion depth 1: sub-calls would exceed the recursion limit of 1',
      );
    });

    it('is withheld at depth 0 when the limit is 0', async () => {
      const box = await sandbox({ maxRecursionDepth: 0, onQuery: async () => 'unused' });
      const result = await box.execute("llm_query('x');");
      expect(result.error).toContain('recursion limit of 0');
    });

    it('raises inside the code and records the provider fault', async () => {
      const box = await sandbox({
        onQuery: async () => {
          throw new Error('provider down');
        },
      });
      const result = await box.execute(
        "try { llm_query('x'); } catch (e) { print('caught ' + e.message); }",
      );
      expect(result.output).toBe('caught llm_query failed: provider down\n');
      expect(result.error).toBeUndefined();
      expect(result.fault?.message).toBe('provider down');
    });

    it('clears the fault on the next execution', async () => {
      let fail = true;
      const box = await sandbox({
        onQuery: async () => {
          if (fail) throw new Error('flaky');
          return 'ok';
        },
      });
      const first = await box.execute("try { llm_query('x'); } catch (e) {}");
      expect(first.fault).toBeDefined();
      fail = false;
      const second = await box.execute("print(llm_query('x'));");
      expect(second.fault).toBeUndefined();
      expect(second.output).toBe('ok\n');
    });
  });

  describe('namespace inspection', () => {
    it('describes bindings by kind', async () => {
      const box = await sandbox();
      await box.execute(
        "var answer = 42; var items = [1, 2, 3]; let label = 'ok'; var lookup = new Map([['a', 1]]); var fn = function helper() {};",
      );

      expect(await box.getVariable('answer')).toEqual({ name: 'answer', kind: 'number', preview: '42' });
      expect(await box.getVariable('items')).toEqual({ name: 'items', kind: 'sequence', size: 3, preview: '[1,2,3]' });
      expect(await box.getVariable('label')).toEqual({ name: 'label', kind: 'text', size: 2, preview: 'ok' });
      expect(await box.getVariable('lookup')).toEqual({ name: 'lookup', kind: 'mapping', size: 1, preview: '{"a":1}' });
      expect(await box.getVariable('fn')).toEqual({ name: 'fn', kind: 'function', preview: '[function helper]' });
    });

    it('returns undefined for unbound or invalid names', async () => {
      const box = await sandbox();
      expect(await box.getVariable('missing')).toBeUndefined();
      expect(await box.getVariable('not a name')).toBeUndefined();
    });

    it('returns undefined for reserved words', async () => {
      const box = await sandbox();
      expect(await box.getVariable('new')).toBeUndefined();
      expect(await box.getVariable('class')).toBeUndefined();
      expect(await box.getVariable('if')).toBeUndefined();
    });

    it('describes a null binding with the null kind', async () => {
      const box = await sandbox();
      await box.execute('var nothing = null;');
      expect(await box.getVariable('nothing')).toEqual({ name: 'nothing', kind: 'null', preview: 'null' });
    });

    it('returns long text values in full', async () => {
      const box = await sandbox();
      await box.execute("var big = 'x'.repeat(1000);");
      const value = await box.getVariable('big');
      expect(value?.preview).toHaveLength(1000);
    });

    it('lists user bindings and the context, not the intrinsics', async () => {
      const box = await sandbox();
      await box.execute("var answer = 'x'.repeat(500);");
      const listed = await box.listVariables();
      const names = listed.map((v) => v.name);

      expect(names).toContain('context');
      expect(names).toContain('answer');
      expect(names).not.toContain('print');
      expect(names).not.toContain('llm_query');
      expect(names).not.toContain('__describe');

      const answer = listed.find((v) => v.name === 'answer');
      expect(answer?.size).toBe(500);
      // previews are capped at 200 characters plus an ellipsis
      expect(answer?.preview).toHaveLength(203);
    });
  });

  describe('dispose', () => {
    it('rejects execution after disposal', async () => {
      const box = await sandbox();
      box.dispose();
      box.dispose();
      await expect(box.execute('print(1)')).rejects.toBeInstanceOf(SandboxError);
    });
  });
});
