/**
 * Files written by `guidesmith init`.
 */

export const CONFIG_TEMPLATE = `# ═══════════════════════════════════════════════════════════════════════════════
# config.yaml - guidesmith configuration
# ═══════════════════════════════════════════════════════════════════════════════
#
# Commands:
#   guidesmith new NAME TYPE  - Scaffold a guide (TYPE: how | why)
#   guidesmith check          - Read-only format + lint run (used by the hook)
#   guidesmith fix            - Format in place, then lint
#   guidesmith setup          - Install the git pre-commit hook
# ═══════════════════════════════════════════════════════════════════════════════

# Markdown files making up the documentation tree
docs:
  include:
    - "**/*.md"
  exclude:
    - "**/node_modules/**"
    - "**/dist/**"
    - "**/.git/**"

# Index documents listing every guide (updated by hand after "new")
index:
  root_guide: CLAUDE.md
  readme: README.md

# External tools (resolved from node_modules/.bin first, then PATH)
tools:
  formatter:
    command: prettier
    config: .prettierrc.json
  structural_linter:
    command: markdownlint
    config: .markdownlint.json
  prose_linter:
    command: vale
    config: .vale.ini

# Prose linting only covers onboarded files.
# Add a directory to exclude while its guides still predate the current rules.
prose:
  include:
    - "*.md"
  exclude: []
  advisory: false
`;

export const PRETTIER_TEMPLATE = `{
  "proseWrap": "preserve",
  "embeddedLanguageFormatting": "off"
}
`;

export const MARKDOWNLINT_TEMPLATE = `{
  "default": true,
  "MD013": false,
  "MD033": false,
  "MD041": true
}
`;

export const VALE_TEMPLATE = `StylesPath = .vale/styles
MinAlertLevel = suggestion

Packages = write-good

[*.md]
BasedOnStyles = Vale, write-good
`;

/**
 * Default files keyed by their path relative to the project root.
 */
export const INIT_FILES: ReadonlyArray<{ path: string; content: string }> = [
  { path: '.guidesmith/config.yaml', content: CONFIG_TEMPLATE },
  { path: '.prettierrc.json', content: PRETTIER_TEMPLATE },
  { path: '.markdownlint.json', content: MARKDOWNLINT_TEMPLATE },
  { path: '.vale.ini', content: VALE_TEMPLATE },
];
