import { ChatOpenAI } from '@langchain/openai';
import type { BaseMessage, MessageContent } from '@langchain/core/messages';
import { config } from '../../../config/env';
import { getModelConfig } from '../../../config/models';
import type { ModelRole } from '../../../config/models';

/**
 * 调度器使用的最小聊天模型接口
 * ChatOpenAI 以及任何 LangChain 聊天模型都满足它，测试中可以注入假模型
 */
export interface ChatModel {
  invoke(messages: BaseMessage[], options?: { signal?: AbortSignal }): Promise<{ content: MessageContent }>;
}

/**
 * 根据角色配置创建 ChatOpenAI
 */
export function createChatModel(role: ModelRole): ChatOpenAI {
  const modelConfig = getModelConfig(role);
  return new ChatOpenAI({
    modelName: modelConfig.modelName,
    temperature: modelConfig.temperature,
    maxTokens: modelConfig.maxTokens,
    openAIApiKey: config.openai.apiKey,
    configuration: {
      baseURL: config.openai.baseUrl,
    },
  });
}

/**
 * 把消息内容转换为纯文本，非文本部分被忽略
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}
