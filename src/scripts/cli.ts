import { Command, InvalidArgumentError } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import {
  clientConfigFromEnv,
  withN8nClient,
  type N8nClient,
  type N8nClientConfig,
} from '../services/n8n-api-client.js';
import { createWorkflowFromBlueprint } from '../blueprints/index.js';
import { WorkflowSchema } from '../models/schemas.js';
import { parseEntity } from '../utils/validation.js';
import { handleError } from '../utils/error-handler.js';
import { createChildLogger } from '../utils/logger.js';
import type { ExecutionStatus } from '../types/index.js';

interface ListOpts {
  limit: number;
  cursor?: string;
  json?: boolean;
}

export interface CliOptions {
  /** Client settings for one command; config/default.json and N8N_* by default */
  clientConfig?: (operation: string) => N8nClientConfig;
}

function defaultClientConfig(operation: string): N8nClientConfig {
  return clientConfigFromEnv({
    logger: createChildLogger({ command: operation }),
  });
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function printCursor(nextCursor: string | undefined): void {
  if (nextCursor) {
    console.log(`  Next page: --cursor ${nextCursor}`);
  }
  console.log();
}

/**
 * Build the n8n-client command tree. Parsing is left to the caller.
 */
export function createProgram(options: CliOptions = {}): Command {
  const clientConfig = options.clientConfig ?? defaultClientConfig;
  const program = new Command();

  /**
   * Run a command against a connected client; the client is always closed
   * and failures set a non-zero exit code.
   */
  async function run(
    operation: string,
    action: (client: N8nClient) => Promise<void>
  ): Promise<void> {
    try {
      await withN8nClient(clientConfig(operation), action);
    } catch (error) {
      handleError(error, operation);
      process.exitCode = 1;
    }
  }

  program
    .name('n8n-client')
    .description('n8n workflow management CLI')
    .version('0.1.0');

  // Test connection
  program
    .command('test')
    .description('Test n8n API connection')
    .action(() =>
      run('Connection test', async (client) => {
        await client.ping();
        console.log(`\nn8n API connection: OK (${client.baseUrl})`);
      })
    );

  // List workflows
  program
    .command('list')
    .description('List workflows')
    .option('-l, --limit <n>', 'Page size', parseInteger, 100)
    .option('-c, --cursor <cursor>', 'Cursor of the page to fetch')
    .option('--json', 'Output as JSON')
    .action((opts: ListOpts) =>
      run('List workflows', async (client) => {
        const page = await client.workflows.list(opts);

        if (opts.json) {
          printJson(page);
          return;
        }

        console.log(`\nFound ${page.data.length} workflow(s):\n`);
        for (const wf of page.data) {
          console.log(`  ${wf.id} - ${wf.name} (${wf.nodes.length} nodes)`);
        }
        printCursor(page.nextCursor);
      })
    );

  // Get workflow details
  program
    .command('get <id>')
    .description('Get workflow details')
    .option('--json', 'Output as JSON')
    .action((id: string, opts: { json?: boolean }) =>
      run('Get workflow', async (client) => {
        const workflow = await client.workflows.get(id);

        if (opts.json) {
          printJson(workflow);
          return;
        }

        console.log(`\nWorkflow: ${workflow.name}`);
        console.log(`  ID: ${workflow.id}`);
        console.log(`  Created: ${workflow.createdAt}`);
        console.log(`  Updated: ${workflow.updatedAt}`);
        console.log(`  Execution order: ${workflow.settings.executionOrder}`);
        console.log(`  Nodes: ${workflow.nodes.length}`);
        for (const node of workflow.nodes) {
          console.log(`    - ${node.name} (${node.type})`);
        }
        console.log();
      })
    );

  // Create workflow from a blueprint file
  program
    .command('create <blueprint-file>')
    .description('Create workflow from a blueprint JSON file')
    .option('-n, --name <name>', 'Override the blueprint name')
    .action((blueprintFile: string, opts: { name?: string }) =>
      run('Create workflow', async (client) => {
        const workflow = await createWorkflowFromBlueprint(
          client,
          blueprintFile,
          opts.name
        );

        console.log(`\nWorkflow created successfully!`);
        console.log(`  ID: ${workflow.id}`);
        console.log(`  Name: ${workflow.name}`);
        console.log();
      })
    );

  // Update workflow from JSON file
  program
    .command('update <id> <json-file>')
    .description('Replace a workflow with the contents of a JSON file')
    .action((id: string, jsonFile: string) =>
      run('Update workflow', async (client) => {
        const data: unknown = JSON.parse(await readFile(jsonFile, 'utf-8'));
        const workflow = await client.workflows.update(
          id,
          parseEntity(WorkflowSchema, data, 'workflow')
        );

        console.log(`\nWorkflow updated successfully!`);
        console.log(`  ID: ${workflow.id}`);
        console.log(`  Name: ${workflow.name}`);
        console.log();
      })
    );

  // Delete workflow
  program
    .command('delete <id>')
    .description('Delete a workflow')
    .option('-f, --force', 'Skip confirmation')
    .action((id: string, opts: { force?: boolean }) =>
      run('Delete workflow', async (client) => {
        if (!opts.force) {
          const workflow = await client.workflows.get(id);
          console.log(`\nAbout to delete workflow: ${workflow.name} (${id})`);
          console.log('Use --force to skip this confirmation');
          return;
        }

        await client.workflows.delete(id);
        console.log(`\nWorkflow ${id} deleted successfully!`);
      })
    );

  // Export workflow to JSON file
  program
    .command('export <id> [output-file]')
    .description('Export workflow to JSON file')
    .action((id: string, outputFile?: string) =>
      run('Export workflow', async (client) => {
        const workflow = await client.workflows.get(id);
        const json = JSON.stringify(workflow, null, 2);

        if (outputFile) {
          await writeFile(outputFile, json, 'utf-8');
          console.log(`\nWorkflow exported to: ${outputFile}`);
        } else {
          console.log(json);
        }
      })
    );

  // Clone workflow
  program
    .command('clone <id> <new-name>')
    .description('Clone an existing workflow with a new name')
    .action((id: string, newName: string) =>
      run('Clone workflow', async (client) => {
        const original = await client.workflows.get(id);
        const workflow = await client.workflows.create({
          ...original,
          name: newName,
        });

        console.log(`\nWorkflow cloned successfully!`);
        console.log(`  New ID: ${workflow.id}`);
        console.log(`  Name: ${workflow.name}`);
        console.log();
      })
    );

  // Executions
  const executions = program
    .command('executions')
    .description('Inspect execution records');

  executions
    .command('list')
    .description('List recent executions')
    .option('-l, --limit <n>', 'Page size', parseInteger, 10)
    .option('-c, --cursor <cursor>', 'Cursor of the page to fetch')
    .option('-w, --workflow <id>', 'Filter by workflow ID')
    .option('--status <status>', 'Filter by status (success, error, waiting, etc.)')
    .option('--json', 'Output as JSON')
    .action(
      (opts: ListOpts & { workflow?: string; status?: ExecutionStatus }) =>
        run('List executions', async (client) => {
          const page = await client.executions.list({
            limit: opts.limit,
            cursor: opts.cursor,
            workflowId: opts.workflow,
            status: opts.status,
          });

          if (opts.json) {
            printJson(page);
            return;
          }

          console.log(`\nFound ${page.data.length} execution(s):\n`);
          for (const exec of page.data) {
            const status = (exec.status ?? 'unknown').toUpperCase().padEnd(10);
            const date = exec.startedAt
              ? new Date(exec.startedAt).toLocaleString()
              : 'not started';
            console.log(
              `  [${status}] ${exec.id} - ${date} (workflow: ${exec.workflowId})`
            );
          }
          printCursor(page.nextCursor);
        })
    );

  executions
    .command('get <id>')
    .description('Show one execution as JSON')
    .option('-d, --data', 'Include execution data')
    .action((id: string, opts: { data?: boolean }) =>
      run('Get execution', async (client) => {
        printJson(
          await client.executions.get(id, { includeData: opts.data ?? false })
        );
      })
    );

  executions
    .command('delete <id>')
    .description('Delete an execution')
    .action((id: string) =>
      run('Delete execution', async (client) => {
        await client.executions.delete(id);
        console.log(`\nExecution ${id} deleted successfully!`);
      })
    );

  // Credentials
  const credentials = program
    .command('credentials')
    .description('Manage credentials');

  credentials
    .command('list')
    .description('List credentials')
    .option('-l, --limit <n>', 'Page size', parseInteger, 100)
    .option('-c, --cursor <cursor>', 'Cursor of the page to fetch')
    .option('--json', 'Output as JSON')
    .action((opts: ListOpts) =>
      run('List credentials', async (client) => {
        const page = await client.credentials.list(opts);

        if (opts.json) {
          printJson(page);
          return;
        }

        console.log(`\nFound ${page.data.length} credential(s):\n`);
        for (const credential of page.data) {
          console.log(`  ${credential.id} - ${credential.name} (${credential.type})`);
        }
        printCursor(page.nextCursor);
      })
    );

  credentials
    .command('schema <type>')
    .description('Show the data schema of a credential type')
    .action((credentialType: string) =>
      run('Get credential schema', async (client) => {
        printJson(await client.credentials.getSchema(credentialType));
      })
    );

  credentials
    .command('delete <id>')
    .description('Delete a credential')
    .action((id: string) =>
      run('Delete credential', async (client) => {
        await client.credentials.delete(id);
        console.log(`\nCredential ${id} deleted successfully!`);
      })
    );

  // Tags
  const tags = program.command('tags').description('Manage tags');

  tags
    .command('list')
    .description('List tags')
    .option('-l, --limit <n>', 'Page size', parseInteger, 100)
    .option('-c, --cursor <cursor>', 'Cursor of the page to fetch')
    .option('--json', 'Output as JSON')
    .action((opts: ListOpts) =>
      run('List tags', async (client) => {
        const page = await client.tags.list(opts);

        if (opts.json) {
          printJson(page);
          return;
        }

        console.log(`\nFound ${page.data.length} tag(s):\n`);
        for (const tag of page.data) {
          console.log(`  ${tag.id} - ${tag.name}`);
        }
        printCursor(page.nextCursor);
      })
    );

  tags
    .command('create <name>')
    .description('Create a tag')
    .action((name: string) =>
      run('Create tag', async (client) => {
        const tag = await client.tags.create({ name });
        console.log(`\nTag created: ${tag.id} - ${tag.name}`);
      })
    );

  tags
    .command('get <id>')
    .description('Show one tag as JSON')
    .action((id: string) =>
      run('Get tag', async (client) => {
        printJson(await client.tags.get(id));
      })
    );

  tags
    .command('delete <id>')
    .description('Delete a tag')
    .action((id: string) =>
      run('Delete tag', async (client) => {
        await client.tags.delete(id);
        console.log(`\nTag ${id} deleted successfully!`);
      })
    );

  // Security audit
  program
    .command('audit')
    .description('Generate a security audit of the instance')
    .option(
      '--days-abandoned-workflow <n>',
      'Days without execution before a workflow counts as abandoned',
      parseInteger
    )
    .option('--categories <list>', 'Comma-separated risk categories to report')
    .action((opts: { daysAbandonedWorkflow?: number; categories?: string }) =>
      run('Generate audit', async (client) => {
        const additionalOptions: Record<string, unknown> = {};
        if (opts.daysAbandonedWorkflow !== undefined) {
          additionalOptions.daysAbandonedWorkflow = opts.daysAbandonedWorkflow;
        }
        if (opts.categories) {
          additionalOptions.categories = opts.categories.split(',');
        }

        const audit = await client.audit.generate(
          Object.keys(additionalOptions).length ? { additionalOptions } : undefined
        );
        printJson(audit);
      })
    );

  return program;
}
