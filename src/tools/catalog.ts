export const TOOL_CATALOG_ORDER = [
  'detect-domain',
  'suggest-department',
  'validate-artifact',
] as const;

export type ToolName = typeof TOOL_CATALOG_ORDER[number];
