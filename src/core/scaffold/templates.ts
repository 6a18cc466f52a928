/**
 * Guide skeletons, one per category.
 *
 * Placeholders: {{TITLE}} is the name with its first character upper-cased,
 * {{NAME}} is the name verbatim. Both bodies are already prettier-clean, so a
 * freshly scaffolded guide passes `guidesmith check`.
 */
import type { Category } from '../category/index.js';

export const MECHANICS_TEMPLATE = `# {{TITLE}}

Brief description of what {{NAME}} is and when to use it.

## Quick Reference

| Command / Pattern | Description  |
| ----------------- | ------------ |
| \`example\`         | What it does |

## Basic Usage

\`\`\`bash
# Example command
{{NAME}} --help
\`\`\`
`;

export const MENTAL_MODEL_TEMPLATE = `# {{TITLE}}

Why this matters and when to apply these principles.

## Core Concepts

### First Principle

Explanation of the fundamental idea.

**Example:**

\`\`\`text
Concrete illustration of the concept
\`\`\`
`;

export const TEMPLATES: Readonly<Record<Category, string>> = {
  how: MECHANICS_TEMPLATE,
  why: MENTAL_MODEL_TEMPLATE,
};
