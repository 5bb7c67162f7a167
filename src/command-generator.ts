// ========================================
// Docker Command Gateway - Command Generator & Prompt Builder
// ========================================

import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { PROJECT_ROOT } from './config.js';
import { errorMessage } from './errors.js';
import type { CandidateCommand, ChatMessage, CompletionOptions, LLMBackend } from './types.js';

export const DEFAULT_EXAMPLES_PATH = path.join(PROJECT_ROOT, 'config', 'command-examples.json');

const commandExampleSchema = z.object({
    intent: z.string(),
    container: z.string(),
    command: z.string(),
});

export type CommandExample = z.infer<typeof commandExampleSchema>;

export function loadCommandExamples(examplesPath: string = DEFAULT_EXAMPLES_PATH): CommandExample[] {
    return z.array(commandExampleSchema).parse(fs.readJSONSync(examplesPath));
}

export function formatExamples(examples: CommandExample[]): string {
    return examples
        .map((ex) => `Intent: "${ex.intent}"\nContainer: "${ex.container}"\nResponse: ${ex.command}`)
        .join('\n\n');
}

/**
 * Strip one markdown fence wrapping the whole reply, then surrounding whitespace.
 */
export function cleanCompletion(answer: string): string {
    const trimmed = answer.trim();
    const fenced = trimmed.match(/^```[a-z]*[ \t]*\n?([\s\S]*?)\n?```$/i);
    if (fenced) {
        return fenced[1].trim();
    }
    return trimmed;
}

export interface CommandGeneratorOptions {
    systemPrompt: string;
    examples: CommandExample[];
    completion: CompletionOptions;
}

/**
 * Turns an intent into a candidate docker command with a single backend call.
 * Never retries and never throws: every failure comes back as an unsuccessful candidate.
 */
export class CommandGenerator {
    private readonly backend: LLMBackend;
    private readonly systemMessage: string;
    private readonly completion: CompletionOptions;

    constructor(backend: LLMBackend, opts: CommandGeneratorOptions) {
        this.backend = backend;
        this.systemMessage = `${opts.systemPrompt}\n\nExamples:\n${formatExamples(opts.examples)}`;
        this.completion = opts.completion;
    }

    buildMessages(intent: string, containerName: string, context?: string): ChatMessage[] {
        let userMessage = `Intent: ${intent}\nContainer: ${containerName}`;
        if (context && context.trim()) {
            userMessage += `\nContext: ${context}`;
        }
        return [
            { role: 'system', content: this.systemMessage },
            { role: 'user', content: userMessage },
        ];
    }

    async generate(intent: string, containerName: string, context?: string): Promise<CandidateCommand> {
        const messages = this.buildMessages(intent, containerName, context);
        console.log(`[LLM] Generating command via ${this.backend.name} for container ${containerName}`);

        try {
            const result = await this.backend.call(messages, this.completion);
            const command = cleanCompletion(result.answer);
            if (!command) {
                return { success: false, command: '', errorMessage: 'LLM generation failed: empty completion' };
            }
            console.log(`[LLM] Candidate command: ${command}`);
            return { success: true, command };
        } catch (err) {
            console.error(`[FAIL] LLM generation failed:`, errorMessage(err));
            return { success: false, command: '', errorMessage: `LLM generation failed: ${errorMessage(err)}` };
        }
    }
}
