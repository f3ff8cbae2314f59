import path from 'path';
import { promises as fs } from 'fs';
import { glob } from 'glob';
import yaml from 'js-yaml';
import { z } from 'zod';
import { addLog } from '@insight/shared/logger';

const PromptFrontMatterSchema = z.object({
    name: z.string().min(1, 'Prompt name is required.'),
    description: z.string().min(1, 'Prompt description is required.'),
    variables: z
        .union([
            z.array(z.string()),
            z.string().transform(s => s.split(',').map(v => v.trim()).filter(Boolean)),
            z.null(),
        ])
        .optional()
        .transform(value => value ?? []),
});

export interface PromptTemplate {
    name: string;
    description: string;
    variables: string[];
    template: string;
    filePath: string;
}

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Parse a `.prompt.md` file: YAML front matter between `---` fences, then the template body.
 */
export async function parsePromptFile(filePath: string): Promise<PromptTemplate> {
    const content = await fs.readFile(filePath, 'utf-8');
    const parts = content.split('---');
    if (parts.length < 3) {
        throw new Error(`Invalid prompt file (missing front matter): ${filePath}`);
    }
    const frontMatter = yaml.load(parts[1] ?? '') ?? {};
    const parsed = PromptFrontMatterSchema.safeParse(frontMatter);
    if (!parsed.success) {
        throw new Error(`Invalid front matter in ${filePath}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }
    const template = parts.slice(2).join('---').trim();
    if (!template) {
        throw new Error(`Missing prompt content in ${filePath}`);
    }

    const used = new Set(Array.from(template.matchAll(PLACEHOLDER), match => match[1] ?? ''));
    const undeclared = [...used].filter(name => !parsed.data.variables.includes(name));
    if (undeclared.length > 0) {
        throw new Error(`Prompt ${parsed.data.name} uses undeclared variables: ${undeclared.join(', ')}`);
    }

    return {
        name: parsed.data.name,
        description: parsed.data.description,
        variables: parsed.data.variables,
        template,
        filePath,
    };
}

export function renderPrompt(prompt: PromptTemplate, values: Record<string, string>): string {
    return prompt.template.replace(PLACEHOLDER, (_match, key: string) => {
        const value = values[key];
        if (value === undefined) {
            throw new Error(`Prompt ${prompt.name} is missing a value for {${key}}`);
        }
        return value;
    });
}

/**
 * Named prompt templates loaded from one directory.
 */
export class PromptLibrary {
    private readonly prompts = new Map<string, PromptTemplate>();

    constructor(prompts: PromptTemplate[]) {
        for (const prompt of prompts) {
            if (this.prompts.has(prompt.name)) {
                throw new Error(`Duplicate prompt name ${prompt.name} (${prompt.filePath})`);
            }
            this.prompts.set(prompt.name, prompt);
        }
    }

    has(name: string): boolean {
        return this.prompts.has(name);
    }

    get(name: string): PromptTemplate {
        const prompt = this.prompts.get(name);
        if (!prompt) {
            throw new Error(`Unknown prompt: ${name}`);
        }
        return prompt;
    }

    names(): string[] {
        return Array.from(this.prompts.keys()).sort();
    }

    render(name: string, values: Record<string, string> = {}): string {
        return renderPrompt(this.get(name), values);
    }

    /**
     * Throws when any of the given prompt names is absent.
     */
    require(names: readonly string[]): this {
        const missing = names.filter(name => !this.prompts.has(name));
        if (missing.length > 0) {
            throw new Error(`Missing prompts: ${missing.join(', ')}`);
        }
        return this;
    }
}

export async function loadPromptLibrary(promptDir: string): Promise<PromptLibrary> {
    const files = await glob('*.prompt.md', { cwd: promptDir, absolute: true });
    files.sort();
    const prompts = await Promise.all(files.map(file => parsePromptFile(file)));
    addLog(`[Prompt Loader] Loaded ${prompts.length} prompts from ${path.relative(process.cwd(), promptDir) || '.'}`);
    return new PromptLibrary(prompts);
}
