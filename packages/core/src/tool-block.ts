// <Tool> blocks: a tool schema rendered as YAML for the planning prompt

import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import type { ToolSchema } from "./types/tool";
import { InvalidInputError } from "./types/errors";
import { ToolSchemaSchema, toToolSchema } from "./schemas";

const OPEN_TAG = "<Tool>";
const CLOSE_TAG = "</Tool>";

export function renderToolBlock(schema: ToolSchema): string {
  // Key order is part of the prompt format.
  const body = stringifyYaml(
    {
      name: schema.name,
      description: schema.description,
      tags: [...schema.tags],
      parameters: schema.parameters.map((p) => ({
        name: p.name,
        type: p.type,
        description: p.description,
        required: p.required,
      })),
    },
    { lineWidth: 0 },
  );
  return `${OPEN_TAG}\n${body}${CLOSE_TAG}`;
}

export function parseToolBlock(block: string): ToolSchema {
  const text = block.trim();
  if (!text.startsWith(OPEN_TAG) || !text.endsWith(CLOSE_TAG)) {
    throw new InvalidInputError("Expected a <Tool>...</Tool> block");
  }

  const body = text.slice(OPEN_TAG.length, text.length - CLOSE_TAG.length);
  const parsed = ToolSchemaSchema.safeParse(parseYaml(body));
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid tool block: ${parsed.error.message}`);
  }
  return toToolSchema(parsed.data);
}
