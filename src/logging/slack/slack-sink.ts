/**
 * Slack webhook output sink with buffering and retry
 *
 * Sends log messages to Slack via an incoming webhook for remote monitoring.
 * Features:
 * - Buffers failed messages for retry
 * - Exponential backoff retry (1s, 2s, 4s, 8s...) capped at 60s
 * - Drops oldest messages when buffer full
 * - Slack issues never reach the control loop
 */

import type { FetchFn, SlackSink, SlackSinkConfig, InitMessage } from '../types';

const MAX_RETRY_DELAY_MS = 60000;

/**
 * Message in the retry buffer
 */
interface BufferedMessage {
  text: string;
  retries: number;
}

/**
 * Create a Slack sink with buffering and retry
 *
 * @param fetchFn - fetch implementation (global fetch in production)
 * @param config - Slack sink configuration
 *
 * @example
 * ```typescript
 * const slackSink = createSlackSink(fetch, {
 *   webhookUrl: "https://hooks.slack.com/services/T000/B000/XXXX",
 *   bufferSize: 10,
 *   retryDelayMs: 1000,
 *   maxRetries: 5
 * });
 * ```
 */
export function createSlackSink(fetchFn: FetchFn, config: SlackSinkConfig): SlackSink {
  const buffer: BufferedMessage[] = [];
  let retryTimerActive = false;
  let currentRetryDelay = config.retryDelayMs;

  /**
   * Post one message, resolving true on a 2xx answer
   */
  async function sendToSlack(message: BufferedMessage): Promise<boolean> {
    try {
      const response = await fetchFn(config.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: message.text })
      });
      if (!response.ok) {
        console.error('Slack send failed: HTTP ' + response.status);
        return false;
      }
      return true;
    } catch (err) {
      console.error('Slack send exception: ' + String(err));
      return false;
    }
  }

  function scheduleRetry(): void {
    const timer = setTimeout(function() {
      void processBuffer();
    }, currentRetryDelay);
    // Pending retries must not keep the process alive after shutdown
    timer.unref();
  }

  /**
   * Process the retry buffer
   * Sends messages in order until one fails, then backs off
   */
  async function processBuffer(): Promise<void> {
    while (buffer.length > 0) {
      const message = buffer[0];
      const sent = await sendToSlack(message);

      if (sent) {
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;
        continue;
      }

      message.retries++;
      if (message.retries >= config.maxRetries) {
        console.error('Slack message dropped after ' + config.maxRetries + ' retries');
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;
      } else {
        currentRetryDelay = Math.min(currentRetryDelay * 2, MAX_RETRY_DELAY_MS);
      }

      if (buffer.length > 0) {
        scheduleRetry();
        return;
      }
    }

    retryTimerActive = false;
    currentRetryDelay = config.retryDelayMs;
  }

  function enqueue(message: BufferedMessage): void {
    if (buffer.length >= config.bufferSize) {
      const dropped = buffer.shift();
      console.error('Slack buffer full, dropping oldest message: ' + (dropped ? dropped.text.substring(0, 50) : ''));
    }
    buffer.push(message);

    if (!retryTimerActive) {
      retryTimerActive = true;
      scheduleRetry();
    }
  }

  /**
   * Write formatted message to Slack
   * Sent immediately; buffered for retry when the first attempt fails
   */
  function write(formattedMessage: string): void {
    const message: BufferedMessage = { text: formattedMessage, retries: 0 };

    void sendToSlack(message).then(function(sent) {
      if (!sent) {
        enqueue(message);
      }
    });
  }

  async function initialize(): Promise<InitMessage> {
    let parsed: URL;
    try {
      parsed = new URL(config.webhookUrl);
    } catch (_err) {
      return { success: false, message: 'Slack webhook URL is not a valid URL' };
    }
    if (parsed.protocol !== 'https:') {
      return { success: false, message: 'Slack webhook URL must use https' };
    }
    return { success: true, message: 'Slack webhook configured for ' + parsed.host };
  }

  return {
    write: write,
    initialize: initialize,
    getBufferSize: function() { return buffer.length; }
  };
}
