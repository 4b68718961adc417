/**
 * Template Repository Port Interface
 *
 * Read-only access to the prompt templates loaded at process start.
 */

import { PromptTemplate } from '../entities/Template';

export interface ITemplateRepository {
    /**
     * Get a specific template by ID.
     */
    getTemplate(id: string): PromptTemplate | null;

    /**
     * List all available templates.
     */
    listTemplates(): PromptTemplate[];
}
