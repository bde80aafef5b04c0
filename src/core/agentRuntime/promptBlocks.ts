import type { ToolCatalogEntry } from '../gateway/toolRegistry';

/**
 * PromptBlock - a composable unit for building system prompts.
 * Enables stable, deterministic prompt ordering.
 */
export interface PromptBlock {
  /** Section title (used for ordering and as section header) */
  title: string;
  content: string;
  /** Priority for ordering (higher = earlier). Default: 0 */
  priority?: number;
}

/**
 * Render prompt blocks into a single system prompt string.
 * Ordering: higher priority first, then alphabetical by title for stability.
 */
export function renderPromptBlocks(blocks: PromptBlock[]): string {
  const sorted = blocks
    .filter((block) => block.content.trim().length > 0)
    .sort((a, b) => {
      const priorityA = a.priority ?? 0;
      const priorityB = b.priority ?? 0;
      if (priorityB !== priorityA) return priorityB - priorityA;
      return a.title.localeCompare(b.title);
    });

  return sorted
    .map((block) => (block.title.trim() ? `## ${block.title}\n${block.content.trim()}` : block.content.trim()))
    .join('\n\n');
}

export function toolCatalogBlock(tools: ToolCatalogEntry[], priority = 50): PromptBlock {
  const content = tools
    .map((tool) => `- ${tool.name}: ${tool.description}\n  parameters: ${JSON.stringify(tool.parameters)}`)
    .join('\n');
  return { title: 'Available tools', content: content || '(none)', priority };
}
