import { describe, expect, test } from 'vitest';
import { parse as parseYaml } from 'yaml';
import { createLogger } from '@opforge/operation-pipeline';
import { createInterface, runInterface } from '../src/program';

const manifest = {
  info: { title: 'Orders', version: '1.0.0' },
  endpoints: [
    {
      kind: 'endpoint',
      id: 'Orders.Get',
      route: '/orders/{id:int}',
      verb: 'GET',
      responses: [{ statusCode: 404 }]
    }
  ]
};

const manifestYaml = [
  'endpoints:',
  '  - kind: endpoint',
  '    id: Orders.Get',
  '    route: /orders/{id:int}',
  '    verb: GET',
  ''
].join('\n');

function setup(files: Record<string, string>) {
  const output: string[] = [];
  const written = new Map<string, string>();
  const program = createInterface({
    readFile: async (path) => {
      const contents = files[path];
      if (contents === undefined) {
        throw new Error(`missing fixture ${path}`);
      }
      return contents;
    },
    writeFile: async (path, contents) => {
      written.set(path, contents);
    },
    stdout: (text) => {
      output.push(text);
    },
    env: {},
    loggerFactory: () => createLogger('silent')
  });
  return { program, output, written };
}

describe('opforge build', () => {
  test('prints the document as JSON', async () => {
    const { program, output } = setup({ 'manifest.json': JSON.stringify(manifest) });

    await program.parseAsync(['build', 'manifest.json'], { from: 'user' });

    expect(output).toHaveLength(1);
    const document = JSON.parse(output[0]);
    expect(document.openapi).toBe('3.0.3');
    expect(document.info).toEqual({ title: 'Orders', version: '1.0.0' });
    expect(document.paths['/orders/{id}'].get).toEqual({
      tags: ['Orders'],
      parameters: [{ name: 'id', in: 'path', required: true, schema: { type: 'integer', format: 'int32' } }],
      responses: { '404': { description: 'Not Found', content: {}, headers: {} } }
    });
  });

  test('applies the policy file and writes YAML to the output file', async () => {
    const { program, output, written } = setup({
      'manifest.yaml': manifestYaml,
      'policy.json': JSON.stringify({ tagCase: 'lower' })
    });

    await program.parseAsync(['--policy', 'policy.json', 'build', 'manifest.yaml', '--format', 'yaml', '--out', 'openapi.yaml'], {
      from: 'user'
    });

    expect(output).toEqual([]);
    const document = parseYaml(written.get('openapi.yaml') ?? '');
    expect(document.paths['/orders/{id}'].get.tags).toEqual(['orders']);
  });

  test('surfaces invalid policy files', async () => {
    const { program } = setup({
      'manifest.json': JSON.stringify(manifest),
      'policy.json': JSON.stringify({ tagCase: 'upper' })
    });

    await expect(program.parseAsync(['--policy', 'policy.json', 'build', 'manifest.json'], { from: 'user' })).rejects.toThrow(
      /^Invalid document policy: tagCase/
    );
  });
});

describe('opforge inspect', () => {
  test('prints one operation with its removed fields and warnings', async () => {
    const { program, output } = setup({ 'manifest.json': JSON.stringify(manifest) });

    await program.parseAsync(['inspect', 'manifest.json', 'get', '/orders/{id}'], { from: 'user' });

    const result = JSON.parse(output[0]);
    expect(result.path).toBe('/orders/{id}');
    expect(result.method).toBe('get');
    expect(result.operation.parameters).toHaveLength(1);
    expect(result.removedFields).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  test('fails for an unknown endpoint', async () => {
    const { program } = setup({ 'manifest.json': JSON.stringify(manifest) });

    await expect(program.parseAsync(['inspect', 'manifest.json', 'post', '/orders'], { from: 'user' })).rejects.toThrow(
      'No endpoint matches POST /orders'
    );
  });
});

describe('runInterface', () => {
  test('logs the failure and reports exit code 1', async () => {
    const lines: string[] = [];
    const code = await runInterface(['inspect', 'manifest.json', 'post', '/orders'], {
      readFile: async () => JSON.stringify(manifest),
      stdout: () => undefined,
      env: {},
      loggerFactory: (level) => createLogger(level, { write: (line: string) => void lines.push(line) })
    }, 'user');

    expect(code).toBe(1);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('"level":50');
    expect(lines[0]).toContain('"msg":"Command failed"');
    expect(lines[0]).toContain('No endpoint matches POST /orders');
  });

  test('reports exit code 0 after a successful command', async () => {
    const output: string[] = [];
    const code = await runInterface(['build', 'manifest.json'], {
      readFile: async () => JSON.stringify(manifest),
      stdout: (text) => void output.push(text),
      env: {},
      loggerFactory: () => createLogger('silent')
    }, 'user');

    expect(code).toBe(0);
    expect(output).toHaveLength(1);
  });
});
