/**
 * In-Memory Template Repository
 *
 * Holds the prompt templates loaded at process start. Definitions are checked
 * once on construction and frozen.
 */

import { ITemplateRepository } from '../../domain/ports/ITemplateRepository';
import { PromptTemplate, TemplateValue, extractPlaceholders } from '../../domain/entities/Template';
import { TemplateDefinitionError } from '../../domain/errors/StoryboardErrors';

export class InMemoryTemplateRepository implements ITemplateRepository {
    private readonly templates: ReadonlyMap<string, PromptTemplate>;

    constructor(templates: PromptTemplate[]) {
        const byId = new Map<string, PromptTemplate>();
        for (const template of templates) {
            if (byId.has(template.id)) {
                throw new TemplateDefinitionError(template.id, 'defined more than once');
            }
            assertDefaultsMatchBody(template);
            byId.set(template.id, freezeTemplate(template));
        }
        this.templates = byId;
    }

    getTemplate(id: string): PromptTemplate | null {
        return this.templates.get(id) ?? null;
    }

    listTemplates(): PromptTemplate[] {
        return [...this.templates.values()];
    }
}

function assertDefaultsMatchBody(template: PromptTemplate): void {
    const placeholders = extractPlaceholders(template.body);
    const stray = Object.keys(template.defaults).filter(name => !placeholders.includes(name));
    if (stray.length > 0) {
        throw new TemplateDefinitionError(
            template.id,
            `default(s) for placeholder(s) not used by the body: ${stray.join(', ')}`
        );
    }
}

function freezeTemplate(template: PromptTemplate): PromptTemplate {
    const defaults: Record<string, TemplateValue> = {};
    for (const [name, value] of Object.entries(template.defaults)) {
        defaults[name] = deepFreeze(value);
    }
    return Object.freeze({
        ...template,
        defaults: Object.freeze(defaults),
    });
}

function deepFreeze(value: TemplateValue): TemplateValue {
    if (Array.isArray(value)) {
        value.forEach(deepFreeze);
        Object.freeze(value);
        return value;
    }
    if (typeof value === 'object') {
        Object.values(value).forEach(deepFreeze);
        Object.freeze(value);
        return value;
    }
    return value;
}
