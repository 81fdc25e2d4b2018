/**
 * Markdown tool catalog rendered with Handlebars
 */

import * as fs from "fs/promises";
import * as path from "path";
import Handlebars from "handlebars";
import { formatDuration } from "../core/logger/formatters";
import type { ToolSummary } from "../core/types";

export interface CatalogOptions {
  title?: string;
  /** Custom Handlebars template source; the view model is `CatalogView`. */
  template?: string;
}

export interface ParameterView {
  name: string;
  type: string;
  required: boolean;
  description: string;
}

export interface ToolView {
  name: string;
  description: string;
  version: string;
  tags: string;
  timeout: string;
  maxRetries: number;
  cacheable: boolean;
  parameters: ParameterView[];
  outputType: string;
  inputSchemaJson: string;
}

export interface CatalogView {
  title: string;
  count: number;
  tools: ToolView[];
}

const DEFAULT_TEMPLATE = `# {{title}}

{{count}} tool(s) registered.

{{#each tools}}
## {{name}}

{{description}}

- **Version:** {{version}}
{{#if tags}}
- **Tags:** {{tags}}
{{/if}}
- **Timeout:** {{timeout}}
- **Max retries:** {{maxRetries}}
- **Cacheable:** {{#if cacheable}}yes{{else}}no{{/if}}
- **Returns:** {{outputType}}

{{#if parameters.length}}
| Parameter | Type | Required | Description |
|---|---|---|---|
{{#each parameters}}
| \`{{name}}\` | {{type}} | {{#if required}}yes{{else}}no{{/if}} | {{description}} |
{{/each}}
{{else}}
Takes no parameters.
{{/if}}

<details><summary>Input schema</summary>

\`\`\`json
{{inputSchemaJson}}
\`\`\`

</details>

{{/each}}
`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function typeLabel(schema: unknown): string {
  if (!isRecord(schema)) return "any";
  const { type, enum: allowed } = schema;
  if (Array.isArray(allowed)) return allowed.map(v => JSON.stringify(v)).join(" \\| ");
  if (typeof type === "string") return type;
  if (Array.isArray(type)) return type.join(" \\| ");
  return "any";
}

function parametersOf(inputSchema: unknown): ParameterView[] {
  if (!isRecord(inputSchema) || !isRecord(inputSchema.properties)) return [];
  const required = Array.isArray(inputSchema.required) ? inputSchema.required : [];
  return Object.entries(inputSchema.properties).map(([name, schema]) => ({
    name,
    type: typeLabel(schema),
    required: required.includes(name),
    description: isRecord(schema) && typeof schema.description === "string" ? schema.description : "",
  }));
}

export function buildCatalogView(tools: ToolSummary[], title = "Tool Catalog"): CatalogView {
  const sorted = [...tools].sort((a, b) => a.name.localeCompare(b.name));
  return {
    title,
    count: sorted.length,
    tools: sorted.map(tool => ({
      name: tool.name,
      description: tool.description,
      version: tool.version,
      tags: tool.tags.join(", "),
      timeout: formatDuration(tool.timeoutMs),
      maxRetries: tool.maxRetries,
      cacheable: tool.cacheable,
      parameters: parametersOf(tool.inputSchema),
      outputType: typeLabel(tool.outputSchema),
      inputSchemaJson: JSON.stringify(tool.inputSchema, null, 2),
    })),
  };
}

export function renderToolCatalog(tools: ToolSummary[], options: CatalogOptions = {}): string {
  const template = Handlebars.compile<CatalogView>(options.template ?? DEFAULT_TEMPLATE, { noEscape: true });
  return template(buildCatalogView(tools, options.title));
}

/**
 * Render the catalog to `<outDir>/tools.md`. Returns the written path.
 */
export async function writeToolCatalog(
  tools: ToolSummary[],
  outDir: string,
  options: CatalogOptions = {}
): Promise<string> {
  await fs.mkdir(outDir, { recursive: true });
  const file = path.join(outDir, "tools.md");
  await fs.writeFile(file, renderToolCatalog(tools, options), "utf8");
  return file;
}
