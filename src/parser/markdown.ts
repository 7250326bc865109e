import matter from "gray-matter";
import { parseYAML } from "./yaml.js";
import { isRecord } from "../utils/normalize.js";

/**
 * parseMarkdown: Extracts the YAML front matter of a Markdown document.
 *
 * Plugin commands, agents and skills are Markdown files whose front matter
 * carries their configuration; the body is not part of the validated shape.
 *
 * @param rawContent - The raw Markdown string to parse.
 * @returns Front matter attributes (empty object when there is none).
 */
export function parseMarkdown({ rawContent }: { rawContent: string }): unknown {
  const file = matter(rawContent, {
    engines: { yaml: frontMatterEngine },
  });

  return file.data;
}

function frontMatterEngine(input: string): object {
  const parsed = parseYAML({ rawContent: input });
  if (parsed === null) return {};

  if (!isRecord(parsed)) {
    throw new Error("Front matter must be a YAML mapping");
  }

  return parsed;
}
