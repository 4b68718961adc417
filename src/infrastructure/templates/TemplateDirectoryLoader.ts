import fs from 'fs';
import path from 'path';
import { PromptTemplate, TemplateValue, isTemplateValue } from '../../domain/entities/Template';
import { TemplateDefinitionError } from '../../domain/errors/StoryboardErrors';

const BODY_EXTENSION = '.md';
const DEFAULTS_SUFFIX = '.defaults.json';

/**
 * Reads every `<id>.md` body in a directory, paired with an optional
 * `<id>.defaults.json` table of default placeholder values.
 */
export function loadTemplatesFromDirectory(dir: string): PromptTemplate[] {
    const entries = fs.readdirSync(dir).filter(name => name.endsWith(BODY_EXTENSION)).sort();

    const templates = entries.map(fileName => {
        const id = fileName.slice(0, -BODY_EXTENSION.length);
        const body = fs.readFileSync(path.join(dir, fileName), 'utf-8');
        const defaultsPath = path.join(dir, `${id}${DEFAULTS_SUFFIX}`);
        const defaults = fs.existsSync(defaultsPath) ? readDefaults(id, defaultsPath) : {};
        return { id, body, defaults };
    });

    console.log(`[Templates] Loaded ${templates.length} template(s) from ${dir}: ${templates.map(t => t.id).join(', ')}`);
    return templates;
}

/**
 * Loads the bundled templates, then lets `overrideDir` replace any of them
 * by id and add new ones. A missing override directory falls back to the
 * bundled set.
 */
export function loadTemplatesWithOverrides(bundledDir: string, overrideDir?: string): PromptTemplate[] {
    const bundled = loadTemplatesFromDirectory(bundledDir);
    if (!overrideDir) {
        return bundled;
    }
    if (!fs.existsSync(overrideDir) || !fs.statSync(overrideDir).isDirectory()) {
        console.warn(`[Templates] Override directory ${overrideDir} not found, using bundled templates`);
        return bundled;
    }

    const byId = new Map(bundled.map(template => [template.id, template]));
    for (const template of loadTemplatesFromDirectory(overrideDir)) {
        if (byId.has(template.id)) {
            console.log(`[Templates] ${template.id} overridden from ${overrideDir}`);
        }
        byId.set(template.id, template);
    }
    return [...byId.values()].sort((a, b) => a.id.localeCompare(b.id));
}

function readDefaults(id: string, filePath: string): Record<string, TemplateValue> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new TemplateDefinitionError(id, `cannot read defaults table ${filePath}: ${reason}`);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new TemplateDefinitionError(id, 'defaults table must be a JSON object');
    }

    const defaults: Record<string, TemplateValue> = {};
    for (const [name, value] of Object.entries(parsed)) {
        if (!isTemplateValue(value)) {
            throw new TemplateDefinitionError(id, `default for "${name}" is not a usable value`);
        }
        defaults[name] = value;
    }
    return defaults;
}
