import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { contentToText, createChatModel } from '../core/model/ChatModel';
import type { ChatModel } from '../core/model/ChatModel';
import type { ContextHandle } from '../scheduler/types';
import { createLogger } from '../utils/logger';
import type { Agent } from './types';

const logger = createLogger('LlmAgent');

const DEFAULT_SYSTEM_PROMPT = `You are a task execution agent inside a multi-step workflow.
Complete the task you are given. Use the results of earlier tasks when they are provided.
Answer with the result only.`;

export interface LlmAgentOptions {
  name?: string;
  systemPrompt?: string;
  /** 默认使用 worker 角色的 ChatOpenAI */
  model?: ChatModel;
}

/**
 * 通过聊天模型完成任务的 agent
 * 请求与回复记录在任务的上下文中（prompt / response）
 */
export class LlmAgent implements Agent {
  readonly name: string;
  private model: ChatModel;
  private systemPrompt: string;

  constructor(options: LlmAgentOptions = {}) {
    this.name = options.name ?? 'llm';
    this.model = options.model ?? createChatModel('worker');
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
  }

  async run(input: string, context: ContextHandle, signal: AbortSignal): Promise<string> {
    logger.debug(`Invoking model for task ${context.taskId}`);
    context.set('prompt', input);

    const response = await this.model.invoke([new SystemMessage(this.systemPrompt), new HumanMessage(input)], {
      signal,
    });
    const text = contentToText(response.content);

    context.set('response', text);
    logger.debug(`Model responded for task ${context.taskId}`, { length: text.length });
    return text;
  }
}
