import { readFile as readFileFromDisk, writeFile as writeFileToDisk } from 'node:fs/promises';
import { extname } from 'node:path';
import { Command, Option } from 'commander';
import pino from 'pino';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import {
  PolicyValidationError,
  SchemaRegistry,
  assembleOperation,
  buildDocument,
  canonicalPath,
  createLogger,
  loadDocumentPolicy,
  parseManifest,
  publishOperation,
  type DocumentPolicy,
  type EndpointDescriptor,
  type EndpointManifest,
  type PipelineLogger
} from '@opforge/operation-pipeline';

type OutputFormat = 'json' | 'yaml';

type GlobalOptions = {
  policy?: string;
  logLevel?: string;
};

type CliDependencies = {
  readFile?: (path: string) => Promise<string>;
  writeFile?: (path: string, contents: string) => Promise<void>;
  stdout?: (text: string) => void;
  env?: Record<string, string | undefined>;
  loggerFactory?: (level: string) => PipelineLogger;
};

const policyFileSchema = z.record(z.unknown());

function parseStructured(contents: string, path: string): unknown {
  const extension = extname(path).toLowerCase();
  if (extension === '.yaml' || extension === '.yml') {
    return parseYaml(contents);
  }
  try {
    return JSON.parse(contents);
  } catch (err) {
    throw new Error(`Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function formatOutput(payload: unknown, format: OutputFormat): string {
  return format === 'yaml' ? stringifyYaml(payload) : `${JSON.stringify(payload, null, 2)}\n`;
}

function parsePolicyOverrides(raw: unknown): Record<string, unknown> {
  const parsed = policyFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PolicyValidationError(parsed.error.issues);
  }
  return parsed.data;
}

const stderrLogger = (level: string): PipelineLogger => createLogger(level, pino.destination(2));

function findEndpoint(manifest: EndpointManifest, method: string, route: string): EndpointDescriptor {
  const verb = method.toUpperCase();
  const path = canonicalPath(route);
  for (const entry of manifest.endpoints) {
    if (entry.kind === 'endpoint' && entry.verb === verb && (entry.route === route || canonicalPath(entry.route) === path)) {
      return entry;
    }
  }
  throw new Error(`No endpoint matches ${verb} ${route}`);
}

export function createInterface(deps: CliDependencies = {}): Command {
  const readFile = deps.readFile ?? ((path: string) => readFileFromDisk(path, 'utf8'));
  const writeFile = deps.writeFile ?? ((path: string, contents: string) => writeFileToDisk(path, contents, 'utf8'));
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const env = deps.env ?? process.env;
  const loggerFactory = deps.loggerFactory ?? stderrLogger;

  const program = new Command();
  program
    .name('opforge')
    .description('Assemble OpenAPI operation descriptions from an endpoint manifest')
    .option('--policy <file>', 'JSON file with document policy overrides')
    .option('--log-level <level>', 'Log level (fatal|error|warn|info|debug|trace|silent)');

  const formatOption = () =>
    new Option('--format <format>', 'Output format').choices(['json', 'yaml']).default('json');

  async function loadContext(manifestPath: string): Promise<{
    manifest: EndpointManifest;
    policy: DocumentPolicy;
    logger: PipelineLogger;
  }> {
    const options = program.opts<GlobalOptions>();
    const logger = loggerFactory(options.logLevel ?? env.OPFORGE_LOG_LEVEL ?? 'info');
    const overrides = options.policy
      ? parsePolicyOverrides(parseStructured(await readFile(options.policy), options.policy))
      : {};
    const policy = loadDocumentPolicy({ env, overrides });
    const manifest = parseManifest(parseStructured(await readFile(manifestPath), manifestPath));
    logger.debug({ manifest: manifestPath, endpoints: manifest.endpoints.length }, 'Loaded endpoint manifest');
    return { manifest, policy, logger };
  }

  program
    .command('build')
    .description('Build the document for every endpoint in a manifest')
    .argument('<manifest>', 'Endpoint manifest (JSON or YAML)')
    .option('--out <file>', 'Write the document to a file instead of stdout')
    .addOption(formatOption())
    .action(async (manifestPath: string, cmdOptions: { out?: string; format: OutputFormat }) => {
      const { manifest, policy, logger } = await loadContext(manifestPath);
      const document = buildDocument({
        endpoints: manifest.endpoints,
        components: manifest.components,
        info: manifest.info,
        policy,
        logger
      });
      const output = formatOutput(document, cmdOptions.format);
      if (cmdOptions.out) {
        await writeFile(cmdOptions.out, output);
        logger.info({ out: cmdOptions.out }, 'Document written');
        return;
      }
      stdout(output);
    });

  program
    .command('inspect')
    .description('Print the assembled operation for one endpoint')
    .argument('<manifest>', 'Endpoint manifest (JSON or YAML)')
    .argument('<method>', 'HTTP verb')
    .argument('<route>', 'Route template as declared, or its canonical path')
    .addOption(formatOption())
    .action(async (manifestPath: string, method: string, route: string, cmdOptions: { format: OutputFormat }) => {
      const { manifest, policy, logger } = await loadContext(manifestPath);
      const descriptor = findEndpoint(manifest, method, route);
      const registry = new SchemaRegistry(structuredClone(manifest.components?.schemas ?? {}));
      const { operation, removedFields, warnings } = assembleOperation(descriptor, { registry, policy, logger });
      stdout(
        formatOutput(
          {
            path: operation.path,
            method: operation.method,
            operation: publishOperation(operation),
            removedFields,
            warnings
          },
          cmdOptions.format
        )
      );
    });

  return program;
}

/** Runs one command line; a failure is logged at error level and turned into exit code 1. */
export async function runInterface(
  argv: string[],
  deps: CliDependencies = {},
  from: 'node' | 'user' = 'node'
): Promise<number> {
  try {
    await createInterface(deps).parseAsync(argv, { from });
    return 0;
  } catch (err) {
    const logger = (deps.loggerFactory ?? stderrLogger)('error');
    logger.error({ err }, 'Command failed');
    return 1;
  }
}
