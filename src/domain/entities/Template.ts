/**
 * A value a placeholder can take: plain text or a structured value that is
 * rendered to text at substitution time.
 */
export type TemplateValue =
    | string
    | number
    | boolean
    | TemplateValue[]
    | { [key: string]: TemplateValue };

export type TemplateValues = Readonly<Record<string, TemplateValue>>;

/**
 * PromptTemplate is a named body with `{{placeholder}}` tokens and a table of
 * default values, one entry per placeholder that has a sensible default.
 */
export interface PromptTemplate {
    /** Unique id, e.g. "panel-grid" */
    id: string;
    /** Body text containing `{{name}}` tokens */
    body: string;
    /** Default values keyed by placeholder name */
    defaults: TemplateValues;
    /** Optional human-readable summary */
    description?: string;
}

/** Matches a well-formed token and captures the placeholder name. */
export const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z_][A-Za-z0-9_.-]*)\s*\}\}/g;

/** Matches anything token-shaped, well-formed or not. */
export const ANY_TOKEN_PATTERN = /\{\{[^{}]*\}\}/g;

/**
 * Returns the distinct placeholder names referenced by a body, in order of
 * first appearance.
 */
export function extractPlaceholders(body: string): string[] {
    const names: string[] = [];
    for (const match of body.matchAll(PLACEHOLDER_PATTERN)) {
        if (!names.includes(match[1])) {
            names.push(match[1]);
        }
    }
    return names;
}

/**
 * Renders a placeholder value to the text that replaces its token.
 * Scalar arrays become a bulleted list; other structures become JSON.
 */
export function formatTemplateValue(value: TemplateValue): string {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
    }
    if (Array.isArray(value) && value.every(isScalar)) {
        return value.map(item => `- ${String(item)}`).join('\n');
    }
    return JSON.stringify(value, null, 2);
}

function isScalar(value: TemplateValue): value is string | number | boolean {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Type guard for values read from JSON default tables.
 */
export function isTemplateValue(value: unknown): value is TemplateValue {
    if (typeof value === 'string' || typeof value === 'boolean') {
        return true;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value);
    }
    if (Array.isArray(value)) {
        return value.every(isTemplateValue);
    }
    if (typeof value === 'object' && value !== null) {
        return Object.values(value).every(isTemplateValue);
    }
    return false;
}
