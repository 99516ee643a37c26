import EventEmitter from 'eventemitter3';
import type { StatusEvent, StatusEventType } from '../scheduler/types';
import { createLogger } from './logger';
import type { Logger } from './logger';

/**
 * Status event handler
 */
export type StatusEventHandler = (event: StatusEvent) => void | Promise<void>;

type WorkflowEvents = Record<StatusEventType, StatusEventHandler>;

/**
 * Typed event bus for workflow status events
 *
 * Listeners are isolated from each other and from the emitter: a listener
 * that throws or rejects is logged and the remaining listeners still run.
 */
export class EventBus {
  private emitter = new EventEmitter<WorkflowEvents>();
  private logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger('EventBus');
  }

  /**
   * Subscribe to an event
   */
  on(event: StatusEventType, handler: StatusEventHandler): void {
    this.emitter.on(event, handler);
  }

  /**
   * Subscribe to an event once
   */
  once(event: StatusEventType, handler: StatusEventHandler): void {
    const wrapper: StatusEventHandler = (data) => {
      this.off(event, wrapper);
      return handler(data);
    };
    this.on(event, wrapper);
  }

  /**
   * Unsubscribe from an event
   */
  off(event: StatusEventType, handler: StatusEventHandler): void {
    this.emitter.off(event, handler);
  }

  /**
   * Emit an event to every listener of its type
   */
  emit(event: StatusEvent): void {
    this.logger.debug(`${event.type}: ${event.message}`, { workflowId: event.workflowId, taskId: event.taskId });

    const listeners: StatusEventHandler[] = this.emitter.listeners(event.type);
    for (const listener of listeners) {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          void result.catch((error: unknown) => this.logger.logError(error, `Listener for ${event.type} rejected`));
        }
      } catch (error) {
        this.logger.logError(error, `Listener for ${event.type} threw`);
      }
    }
  }

  /**
   * Remove all listeners for an event
   */
  removeAllListeners(event?: StatusEventType): void {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
  }

  /**
   * Get listener count for an event
   */
  listenerCount(event: StatusEventType): number {
    return this.emitter.listenerCount(event);
  }

  /**
   * Wait for an event to be emitted
   */
  waitFor(event: StatusEventType, timeout?: number): Promise<StatusEvent> {
    return new Promise((resolve, reject) => {
      const timeoutId = timeout
        ? setTimeout(() => {
            this.off(event, handler);
            reject(new Error(`Timeout waiting for event: ${event}`));
          }, timeout)
        : null;

      const handler = (data: StatusEvent): void => {
        this.off(event, handler);
        if (timeoutId) clearTimeout(timeoutId);
        resolve(data);
      };

      this.on(event, handler);
    });
  }
}
