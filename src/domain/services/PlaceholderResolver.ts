import {
    ANY_TOKEN_PATTERN,
    PLACEHOLDER_PATTERN,
    PromptTemplate,
    TemplateValue,
    TemplateValues,
    extractPlaceholders,
    formatTemplateValue,
} from '../entities/Template';
import { ITemplateRepository } from '../ports/ITemplateRepository';
import {
    MissingPlaceholderValueError,
    UnknownPlaceholderError,
    UnknownTemplateError,
    UnresolvedTokenError,
} from '../errors/StoryboardErrors';

/**
 * Substitutes overrides and defaults into a template body.
 *
 * Override keys must name placeholders the body references. Each token is
 * replaced in a single pass, so substituted text is never expanded again.
 * Only the body is checked for malformed tokens; values pass through verbatim.
 */
export function renderTemplate(template: PromptTemplate, overrides: TemplateValues = {}): string {
    const placeholders = extractPlaceholders(template.body);

    const unknown = Object.keys(overrides).filter(key => !placeholders.includes(key));
    if (unknown.length > 0) {
        throw new UnknownPlaceholderError(template.id, unknown);
    }

    const values = new Map<string, TemplateValue>();
    const missing: string[] = [];
    for (const name of placeholders) {
        const value = pick(overrides, name) ?? pick(template.defaults, name);
        if (value === undefined) {
            missing.push(name);
        } else {
            values.set(name, value);
        }
    }
    if (missing.length > 0) {
        throw new MissingPlaceholderValueError(template.id, missing);
    }

    const malformed = template.body.replace(PLACEHOLDER_PATTERN, '').match(ANY_TOKEN_PATTERN);
    if (malformed) {
        throw new UnresolvedTokenError(template.id, [...new Set(malformed)]);
    }

    return template.body.replace(PLACEHOLDER_PATTERN, (token: string, name: string) => {
        const value = values.get(name);
        return value === undefined ? token : formatTemplateValue(value);
    });
}

function pick(values: TemplateValues, name: string): TemplateValue | undefined {
    return Object.prototype.hasOwnProperty.call(values, name) ? values[name] : undefined;
}

/**
 * Resolves templates held by the template store.
 */
export class PlaceholderResolver {
    constructor(private readonly templates: ITemplateRepository) { }

    resolve(templateId: string, overrides: TemplateValues = {}): string {
        const template = this.templates.getTemplate(templateId);
        if (!template) {
            throw new UnknownTemplateError(templateId);
        }
        return renderTemplate(template, overrides);
    }

    /**
     * Placeholder names of a stored template, in order of first appearance.
     */
    placeholdersOf(templateId: string): string[] {
        const template = this.templates.getTemplate(templateId);
        if (!template) {
            throw new UnknownTemplateError(templateId);
        }
        return extractPlaceholders(template.body);
    }
}
