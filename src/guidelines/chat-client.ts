/**
 * Chat completion client for guideline selection.
 * Works with any server exposing an OpenAI-compatible /chat/completions.
 */

import { z } from 'zod';
import { ApiError } from '../shared/errors.js';

export interface ChatMessage {
	role: 'system' | 'user' | 'assistant';
	content: string;
}

export interface ChatRequestOptions {
	signal: AbortSignal;
	temperature?: number;
	maxTokens?: number;
}

export interface ChatClient {
	readonly model: string;
	complete(messages: ChatMessage[], options: ChatRequestOptions): Promise<string>;
}

const chatResponseSchema = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({
					content: z.string().nullable().optional(),
				}),
			}),
		)
		.min(1),
});

export interface OpenAICompatConfig {
	baseUrl: string;
	model: string;
	apiKey?: string;
}

export class OpenAICompatChatClient implements ChatClient {
	readonly model: string;
	private readonly baseUrl: string;
	private readonly apiKey: string | undefined;

	constructor(config: OpenAICompatConfig) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, '');
		this.model = config.model;
		this.apiKey = config.apiKey;
	}

	private buildHeaders(): Record<string, string> {
		const headers: Record<string, string> = {
			'Content-Type': 'application/json',
		};
		if (this.apiKey) {
			headers['Authorization'] = `Bearer ${this.apiKey}`;
		}
		return headers;
	}

	async complete(messages: ChatMessage[], options: ChatRequestOptions): Promise<string> {
		const body: Record<string, unknown> = {
			model: this.model,
			messages,
			stream: false,
		};
		if (options.temperature !== undefined) body.temperature = options.temperature;
		if (options.maxTokens !== undefined) body.max_tokens = options.maxTokens;

		const response = await fetch(`${this.baseUrl}/chat/completions`, {
			method: 'POST',
			headers: this.buildHeaders(),
			body: JSON.stringify(body),
			signal: options.signal,
		});

		if (!response.ok) {
			const errorText = await response.text();
			throw new ApiError(`LLM request failed (${response.status}): ${errorText.slice(0, 200)}`, response.status);
		}

		const parsed = chatResponseSchema.safeParse(await response.json());
		if (!parsed.success) {
			throw new ApiError(`Invalid chat completion response: ${parsed.error.message}`);
		}
		return parsed.data.choices[0].message.content ?? '';
	}
}
