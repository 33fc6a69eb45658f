/**
 * Tagged debug log
 *
 * Usage:
 *   debug('assembler', `turn ${turn}: ${width}×${height}`);
 *
 * Control active tags:
 *   enableDebugTag('validate');
 *   setDebugTags(parseDebugTags(process.env.WINDING_DEBUG ?? ''));
 *
 * Messages are buffered, never printed; callers decide where the buffer goes
 * (the CLI writes it to stderr). Output of the geometry core never depends on it.
 */

export type DebugTag = 'validate' | 'builder' | 'assembler' | 'checker' | 'export' | 'share' | 'store';

export const DEBUG_TAGS: readonly DebugTag[] = ['validate', 'builder', 'assembler', 'checker', 'export', 'share', 'store'];

let debugContent: string = '';
const activeTags = new Set<DebugTag>();

const appendLine = (line: string): void => {
  debugContent = debugContent ? debugContent + '\n' + line : line;
};

const isDebugTag = (value: string): value is DebugTag =>
  DEBUG_TAGS.some((tag) => tag === value);

/**
 * Log a debug message with a tag. Only recorded if the tag is active.
 */
export const debug = (tag: DebugTag, content: string): void => {
  if (!activeTags.has(tag)) return;

  const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  appendLine(`[${timestamp}] [${tag}] ${content}`);
};

export const enableDebugTag = (tag: DebugTag): void => {
  activeTags.add(tag);
};

export const disableDebugTag = (tag: DebugTag): void => {
  activeTags.delete(tag);
};

/**
 * Set all active debug tags (replaces existing)
 */
export const setDebugTags = (tags: readonly DebugTag[]): void => {
  activeTags.clear();
  tags.forEach((tag) => activeTags.add(tag));
};

export const getDebugTags = (): DebugTag[] => Array.from(activeTags);

export const isDebugTagActive = (tag: DebugTag): boolean => activeTags.has(tag);

/**
 * Parse a comma-separated tag list such as "validate,assembler" or "all".
 * Unknown names are ignored.
 */
export const parseDebugTags = (spec: string): DebugTag[] => {
  const names = spec.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  if (names.includes('all')) return [...DEBUG_TAGS];
  return names.filter(isDebugTag);
};

export const getDebug = (): string => debugContent;

export const hasDebug = (): boolean => debugContent.length > 0;

export const clearDebug = (): void => {
  debugContent = '';
};

/**
 * Return the buffered content and clear it
 */
export const takeDebug = (): string => {
  const content = debugContent;
  debugContent = '';
  return content;
};
