// src/local-adapter.ts
// Emits a Node runner module that executes a workflow's examples on this machine

import { WorkflowError, createLogger, loadRuntimeConfig } from '@workflow-fields/core';
import { z } from 'zod';

import type { AdaptableWorkflow, DeploymentSource, WorkflowAdapter } from './adapter.js';
import { cleanAndFormatString } from './format-utils.js';

const logger = createLogger('adapters');

const LocalAdapterOptionsSchema = z.object({
  /** Import specifier of the module that exports the workflow. */
  workflowModule: z.string().min(1),
  exportName: z
    .string()
    .regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'must be a JavaScript identifier')
    .default('workflow'),
  /** Where saved responses go; defaults to WORKFLOW_OUTPUT_DIR. */
  outputDir: z.string().min(1).optional(),
  runnerPath: z.string().min(1).default('run-examples.mjs'),
  schemaPath: z.string().min(1).default('workflow.schema.json'),
});

export type LocalAdapterOptions = z.input<typeof LocalAdapterOptionsSchema>;

function renderImport(exportName: string, workflowModule: string): string {
  const binding = exportName === 'workflow' ? 'workflow' : `${exportName} as workflow`;
  return `import { ${binding} } from ${JSON.stringify(workflowModule)};`;
}

export class LocalWorkflowAdapter implements WorkflowAdapter<LocalAdapterOptions> {
  readonly name = 'local';

  convertWorkflow(workflow: AdaptableWorkflow, options: LocalAdapterOptions): DeploymentSource {
    const parsed = LocalAdapterOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new WorkflowError(`Invalid local adapter options: ${detail}`);
    }
    const { workflowModule, exportName, runnerPath, schemaPath } = parsed.data;
    const outputDir = parsed.data.outputDir ?? loadRuntimeConfig().outputDir;

    const schema = workflow.schema();
    const examples = workflow.examples.map((example) => ({
      ...example,
      title: cleanAndFormatString(example.title),
    }));

    const runner = [
      `// Runs every example of ${JSON.stringify(workflow.title)} (${workflow.version}) locally.`,
      "import { randomUUID } from 'node:crypto';",
      "import { mkdir, writeFile } from 'node:fs/promises';",
      "import path from 'node:path';",
      renderImport(exportName, workflowModule),
      '',
      `const examples = ${JSON.stringify(examples)};`,
      `const outputDir = path.resolve(${JSON.stringify(outputDir)});`,
      '',
      'async function runWorkflowExamples() {',
      '  await workflow.load();',
      '  for (const example of examples) {',
      '    const folder = path.join(outputDir, example.title);',
      '    await mkdir(folder, { recursive: true });',
      '    for await (const result of workflow.stream(example.data)) {',
      "      if (!('content_type' in result)) {",
      '        console.log(JSON.stringify(result));',
      "      } else if (typeof result.content === 'string') {",
      '        console.log(`Result (${result.content_type}): ${result.content}`);',
      '      } else {',
      '        const file = path.join(folder, randomUUID());',
      '        await writeFile(file, result.content);',
      '        console.log(`Saved (${result.content_type}): file://${file}`);',
      '      }',
      '    }',
      '  }',
      '}',
      '',
      'await runWorkflowExamples();',
      '',
    ].join('\n');

    logger.info({ workflow: workflow.title, examples: examples.length, runnerPath }, 'Generated local runner');

    return {
      files: [
        { path: runnerPath, content: runner, primary: true },
        { path: schemaPath, content: `${JSON.stringify(schema, null, 2)}\n` },
      ],
    };
  }
}
