import OpenAI from 'openai'
import type { ResolvedConfig } from '../config/schema.js'
import { errorMessage, PermanentError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import { CircuitBreaker, withRetry } from './retry.js'
import type { ChatMessage, ChatParams, ChatResponse, LLMClient, ToolCall } from './types.js'

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content ?? '' }
        case 'user':
            return { role: 'user', content: message.content ?? '' }
        case 'tool':
            return { role: 'tool', content: message.content ?? '', tool_call_id: message.tool_call_id ?? '' }
        case 'assistant':
            return message.tool_calls && message.tool_calls.length > 0
                ? { role: 'assistant', content: message.content, tool_calls: message.tool_calls }
                : { role: 'assistant', content: message.content }
    }
}

export function createLLMClient(config: Pick<ResolvedConfig, 'llm'>, logger: Logger): LLMClient {
    const openai = new OpenAI({
        apiKey: config.llm.apiKey,
        baseURL: config.llm.baseURL,
        defaultHeaders: { 'X-Title': 'concierge' },
    })

    const breaker = new CircuitBreaker()

    return {
        async chat(params: ChatParams): Promise<ChatResponse> {
            if (!config.llm.apiKey) {
                throw new PermanentError('No API key configured. Set CONCIERGE_API_KEY or llm.apiKey in the config file.')
            }
            const model = params.model ?? config.llm.model

            const result = await breaker.execute(() =>
                withRetry(async () => {
                    const response = await openai.chat.completions.create(
                        {
                            model,
                            messages: params.messages.map(toOpenAIMessage),
                            tools: params.tools,
                            temperature: params.temperature ?? config.llm.temperature,
                            max_tokens: params.maxTokens ?? config.llm.maxTokens,
                        },
                        { signal: params.signal }
                    )

                    const choice = response.choices[0]
                    if (!choice) throw new Error('No response from LLM')

                    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((tc) => ({
                        id: tc.id,
                        type: 'function' as const,
                        function: {
                            name: tc.function.name,
                            arguments: tc.function.arguments,
                        },
                    }))

                    let finishReason: ChatResponse['finishReason'] = 'stop'
                    if (choice.finish_reason === 'tool_calls') finishReason = 'tool_calls'
                    else if (choice.finish_reason === 'length') finishReason = 'length'
                    else if (toolCalls.length > 0) finishReason = 'tool_calls'

                    return {
                        content: choice.message.content,
                        toolCalls,
                        finishReason,
                        usage: {
                            promptTokens: response.usage?.prompt_tokens ?? 0,
                            completionTokens: response.usage?.completion_tokens ?? 0,
                        },
                    }
                }, {
                    onRetry: (attempt, error, delay) =>
                        logger.warn({ attempt, delay: Math.round(delay), error: errorMessage(error) }, 'llm:retry'),
                })
            )

            logger.debug({ model, usage: result.usage, finishReason: result.finishReason }, 'llm:response')
            return result
        },
    }
}
