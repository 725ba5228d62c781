/**
 * One connected control client: decodes its messages, replays them through the
 * tab controller, and streams screenshots back until the connection ends.
 */

import type { RequestDebouncer } from './debounce.js';
import { createLogger, errorMessage } from './logger.js';
import { isSuccess, type Outcome } from './outcome.js';
import { decodeClientMessage, type ClientMessage, type ServerMessage } from './protocol.js';
import type { TabController } from './tab-controller.js';

const log = createLogger('session');

/** Outbound half of the transport. */
export interface ControlChannel {
  isOpen(): boolean;
  send(data: string): Promise<void>;
}

export interface SessionOptions {
  frameIntervalMs: number;
  /** Shared by every session of a gateway */
  addTabDebounce: RequestDebouncer;
}

/** Resolves after `ms`, or as soon as the signal aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class ControlSession {
  private readonly abort = new AbortController();
  private inbox: Promise<void> = Promise.resolve();
  private streaming: Promise<void> | null = null;
  private framesSent = 0;

  constructor(
    readonly id: string,
    private readonly channel: ControlChannel,
    private readonly controller: TabController,
    private readonly options: SessionOptions,
  ) {}

  get active(): boolean {
    return !this.abort.signal.aborted;
  }

  get frameCount(): number {
    return this.framesSent;
  }

  /** Begin streaming screenshots. */
  start(): void {
    if (this.streaming || !this.active) return;
    this.streaming = this.streamScreenshots();
  }

  /** End the session. The stream stops; an in-flight capture is discarded. */
  stop(): void {
    if (!this.active) return;
    this.abort.abort();
    log.info(`Session ${this.id} ended after ${this.framesSent} frame(s)`);
  }

  /** Resolves when the stream loop has exited. */
  finished(): Promise<void> {
    return this.streaming ?? Promise.resolve();
  }

  /** Queue one raw frame. Messages are handled strictly in arrival order. */
  receive(raw: string): void {
    this.inbox = this.inbox.then(() => this.handleRaw(raw));
  }

  /** Resolves once every message received so far has been handled. */
  idle(): Promise<void> {
    return this.inbox;
  }

  private async handleRaw(raw: string): Promise<void> {
    // the browser is shared: input queued by a departed client is dropped
    if (!this.active) return;

    const decoded = decodeClientMessage(raw);
    if (!decoded.ok) {
      if (decoded.kind === 'unknown_type') {
        log.warn(`Unknown message type: ${decoded.type}`);
      } else {
        log.error('Invalid message received', { error: decoded.error });
      }
      return;
    }

    try {
      await this.dispatch(decoded.message);
    } catch (err) {
      log.error(`Error handling ${decoded.message.type}`, { error: errorMessage(err) });
    }
  }

  private async dispatch(message: ClientMessage): Promise<void> {
    const tabs = this.controller;
    log.debug(`${message.type} on page ${tabs.getActiveIndex()}`, { message });

    switch (message.type) {
      case 'mouse_move':
        await tabs.mouseMove(message.x, message.y);
        break;
      case 'mouse_click':
        await tabs.mouseClick(message.x, message.y, message.button);
        break;
      case 'mouse_down':
        await tabs.mouseDown(message.x, message.y, message.button);
        break;
      case 'mouse_up':
        await tabs.mouseUp(message.x, message.y, message.button);
        break;
      case 'mouse_wheel':
        await tabs.mouseWheel(message.deltaX, message.deltaY);
        break;
      case 'key_press':
        if (message.key) await tabs.keyboardPress(message.key);
        break;
      case 'key_type':
        if (message.text) await tabs.keyboardType(message.text);
        break;
      case 'navigate':
        await this.reportFailure('navigate', await tabs.navigateTo(message.url));
        break;
      case 'go_back':
        await tabs.goBack();
        break;
      case 'go_forward':
        await tabs.goForward();
        break;
      case 'refresh':
        await tabs.refresh();
        break;
      case 'get_pages':
        await this.send({ type: 'pages_info', pages: await tabs.getPagesInfo() });
        break;
      case 'refresh_pages':
        await tabs.cleanupDuplicatePages();
        await this.send({ type: 'pages_info', pages: await tabs.getPagesInfo() });
        break;
      case 'switch_page': {
        const outcome = await tabs.switchToPage(message.page_index);
        log.info(`Switch to page ${message.page_index}: ${outcome.status}`);
        await this.send({ type: 'page_switched', success: isSuccess(outcome), page_index: message.page_index });
        break;
      }
      case 'close_page': {
        const outcome = await tabs.closePage(message.page_index);
        log.info(`Close page ${message.page_index}: ${outcome.status}`);
        await this.send({ type: 'page_closed', success: isSuccess(outcome), page_index: message.page_index });
        break;
      }
      case 'add_tab':
        await this.addTab();
        break;
    }
  }

  private async addTab(): Promise<void> {
    if (!this.options.addTabDebounce.tryAcquire()) {
      log.info('Add tab request ignored (too soon after last request)');
      await this.send({ type: 'tab_added', success: false, reason: 'duplicate_request' });
      return;
    }

    const outcome = await this.controller.addNewTab();
    await this.send(
      outcome.status === 'refused'
        ? { type: 'tab_added', success: false, reason: outcome.reason }
        : { type: 'tab_added', success: isSuccess(outcome) },
    );
  }

  private async reportFailure(operation: 'navigate', outcome: Outcome): Promise<void> {
    if (outcome.status === 'succeeded') return;
    const message = outcome.status === 'failed' ? outcome.error : outcome.reason;
    await this.send({ type: 'error', operation, message });
  }

  private send(message: ServerMessage): Promise<void> {
    return this.channel.send(JSON.stringify(message));
  }

  private async streamScreenshots(): Promise<void> {
    const { signal } = this.abort;
    try {
      while (!signal.aborted) {
        const data = await this.controller.getScreenshot();
        if (signal.aborted || !this.channel.isOpen()) break;

        await this.send({ type: 'screenshot', data, viewport: this.controller.getViewportSize() });
        this.framesSent += 1;
        if (this.framesSent % 100 === 0) {
          log.debug(`Session ${this.id} sent ${this.framesSent} screenshots`);
        }

        await sleep(this.options.frameIntervalMs, signal);
      }
    } catch (err) {
      if (!signal.aborted) {
        log.warn(`Screenshot stream for ${this.id} stopped`, { error: errorMessage(err) });
      }
    }
  }
}
