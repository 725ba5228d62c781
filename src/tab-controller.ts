/**
 * Owns the browser and every tab the remote client can see.
 *
 * All page-list mutations (switching, closing, opening, deduplicating, and the
 * browser's own new-page notifications) run one at a time on a serial promise
 * queue, so the list and the active index stay consistent across the awaits
 * inside each mutation. Input and screenshots only read the active page and
 * skip the queue.
 */

import { guessPageTitle, normalizeUrl } from './browser-utils.js';
import { ERROR_FRAME, placeholderFrame, renderNoticeFrame, type FrameRenderer, type NoticeFrame } from './frames.js';
import type { BrowserLauncher, LaunchMode, LaunchProfile } from './launcher.js';
import { createLogger, errorMessage } from './logger.js';
import { failed, refused, succeeded, type Outcome } from './outcome.js';
import type { ContextHandle, MouseButton, PageHandle, PageInfo, ViewportSize } from './types.js';

const log = createLogger('tabs');

const NETWORK_IDLE_TIMEOUT_MS = 2000;
const DOM_READY_TIMEOUT_MS = 1000;
const FOCUS_READY_TIMEOUT_MS = 1000;

export const PLACEHOLDER_URL = 'placeholder://page';

export type TrackedPage = { kind: 'live'; handle: PageHandle } | { kind: 'placeholder' };

type BrowserState =
  | { kind: 'idle' }
  | { kind: 'live'; context: ContextHandle; mode: LaunchMode }
  | { kind: 'placeholder' };

export type BrowserMode = LaunchMode | 'placeholder' | 'idle';

export interface TabControllerOptions {
  launcher: BrowserLauncher;
  /** Tried in order; the placeholder browser follows the last one. */
  profiles: LaunchProfile[];
  viewport: ViewportSize;
  startUrl: string;
  newTabUrl: string;
  jpegQuality: number;
  renderFrame?: FrameRenderer;
}

export class TabController {
  private state: BrowserState = { kind: 'idle' };
  private starting: Promise<void> | null = null;
  private pages: TrackedPage[] = [];
  private activeIndex = 0;
  private viewport: ViewportSize;
  private creatingTab = false;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly frames = new Map<string, Promise<string>>();
  private readonly renderFrame: FrameRenderer;

  constructor(private readonly options: TabControllerOptions) {
    this.viewport = { ...options.viewport };
    this.renderFrame = options.renderFrame ?? renderNoticeFrame;
  }

  // ---------- Lifecycle ----------

  /**
   * Launch the browser. Safe to call repeatedly: a live or placeholder browser
   * is kept, and concurrent callers share one launch.
   */
  initialize(): Promise<void> {
    if (this.starting) return this.starting;
    if (this.state.kind !== 'idle') return Promise.resolve();

    this.starting = this.launchWithFallback().finally(() => {
      this.starting = null;
    });
    return this.starting;
  }

  getMode(): BrowserMode {
    return this.state.kind === 'live' ? this.state.mode : this.state.kind;
  }

  async close(): Promise<void> {
    if (this.starting) await this.starting;
    const state = this.state;
    this.state = { kind: 'idle' };
    this.pages = [];
    this.activeIndex = 0;

    if (state.kind === 'live') {
      try {
        await state.context.close();
        log.info('Browser closed');
      } catch (err) {
        log.warn('Browser close failed', { error: errorMessage(err) });
      }
    }
  }

  private async launchWithFallback(): Promise<void> {
    for (const profile of this.options.profiles) {
      let context: ContextHandle | null = null;
      try {
        context = await this.options.launcher.launch(profile);
        await this.adoptContext(context, profile.mode);
        log.info(`Browser ready (${profile.mode}), tracking ${this.pages.length} page(s)`);
        return;
      } catch (err) {
        log.error(`Browser launch failed (${profile.mode})`, { error: errorMessage(err) });
        if (context) await this.discardContext(context);
      }
    }

    log.warn('Falling back to the placeholder browser');
    this.state = { kind: 'placeholder' };
    this.pages = [{ kind: 'placeholder' }];
    this.activeIndex = 0;
  }

  /** Release a browser that launched but could not be set up; it holds the profile lock. */
  private async discardContext(context: ContextHandle): Promise<void> {
    this.state = { kind: 'idle' };
    this.pages = [];
    this.activeIndex = 0;
    try {
      await context.close();
    } catch (err) {
      log.warn('Closing the half-started browser failed', { error: errorMessage(err) });
    }
  }

  private async adoptContext(context: ContextHandle, mode: LaunchMode): Promise<void> {
    const existing = context.pages();
    const handles = existing.length > 0 ? existing : [await context.newPage()];

    this.state = { kind: 'live', context, mode };
    this.pages = handles.map((handle) => ({ kind: 'live', handle }));
    this.activeIndex = 0;
    for (const handle of handles) this.watchClose(handle);

    context.on('page', (page) => {
      this.exclusive(() => this.adoptPage(page)).catch((err: unknown) => {
        log.error('New page handling failed', { error: errorMessage(err) });
      });
    });

    try {
      await handles[0].goto(this.options.startUrl);
    } catch (err) {
      log.warn(`Start page ${this.options.startUrl} did not load`, { error: errorMessage(err) });
    }
  }

  private async ready(): Promise<void> {
    if (this.state.kind === 'idle') await this.initialize();
  }

  private exclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  // ---------- Page tracking ----------

  private liveHandle(entry: TrackedPage | undefined): PageHandle | null {
    return entry?.kind === 'live' ? entry.handle : null;
  }

  private activePage(): PageHandle | null {
    return this.liveHandle(this.pages[this.activeIndex]);
  }

  private urlOf(entry: TrackedPage): string {
    return entry.kind === 'live' ? entry.handle.url() : PLACEHOLDER_URL;
  }

  private indexOfHandle(handle: PageHandle): number {
    return this.pages.findIndex((entry) => entry.kind === 'live' && entry.handle === handle);
  }

  private watchClose(handle: PageHandle): void {
    handle.once('close', () => {
      this.exclusive(() => this.forgetPage(handle)).catch((err: unknown) => {
        log.error('Closed page handling failed', { error: errorMessage(err) });
      });
    });
  }

  /** Fold a page the browser opened on its own (popup, target=_blank) into the list. */
  private async adoptPage(page: PageHandle): Promise<void> {
    if (this.state.kind !== 'live') return;
    if (this.indexOfHandle(page) !== -1) {
      log.debug(`Page already tracked: ${page.url()}`);
      return;
    }

    const url = page.url();
    const duplicate = this.pages.findIndex((entry) => this.urlOf(entry) === url);
    if (duplicate !== -1) {
      log.info(`New page ${url} duplicates tab ${duplicate}, switching to it`);
      this.activeIndex = duplicate;
      return;
    }

    this.pages.push({ kind: 'live', handle: page });
    this.activeIndex = this.pages.length - 1;
    this.watchClose(page);
    log.info(`New page opened: ${url}. Total pages: ${this.pages.length}`);

    this.ensureFocus(page).then(
      (focused) => {
        if (!focused) log.warn(`Could not focus new page ${url}`);
      },
      (err: unknown) => log.warn('Focus on new page failed', { error: errorMessage(err) }),
    );
  }

  /** Drop a page the browser closed by itself. */
  private async forgetPage(handle: PageHandle): Promise<void> {
    const index = this.indexOfHandle(handle);
    if (index === -1 || this.state.kind !== 'live') return;

    if (this.pages.length === 1) {
      log.warn('Last tab was closed by the browser, opening a fresh one');
      const replacement = await this.state.context.newPage();
      this.pages = [{ kind: 'live', handle: replacement }];
      this.activeIndex = 0;
      this.watchClose(replacement);
      return;
    }

    this.removeAt(index);
    log.info(`Page ${index} closed by the browser. Active page: ${this.activeIndex}`);
  }

  /** Remove one entry, keeping the active page active when it survives. */
  private removeAt(index: number): void {
    this.pages.splice(index, 1);
    if (index < this.activeIndex) {
      this.activeIndex -= 1;
    } else if (this.activeIndex >= this.pages.length) {
      this.activeIndex = this.pages.length - 1;
    }
  }

  private dedupe(): number {
    const activeEntry = this.pages[this.activeIndex];
    const activeUrl = activeEntry ? this.urlOf(activeEntry) : undefined;
    const seen = new Set<string>();
    const kept: TrackedPage[] = [];

    for (const entry of this.pages) {
      const url = this.urlOf(entry);
      if (seen.has(url)) continue;
      seen.add(url);
      kept.push(entry);
    }

    const removed = this.pages.length - kept.length;
    if (removed === 0) return 0;

    this.pages = kept;
    const survivor = activeEntry ? kept.indexOf(activeEntry) : -1;
    if (survivor !== -1) {
      this.activeIndex = survivor;
    } else {
      const sameUrl = kept.findIndex((entry) => this.urlOf(entry) === activeUrl);
      this.activeIndex = sameUrl !== -1 ? sameUrl : Math.min(this.activeIndex, kept.length - 1);
    }
    log.info(`Removed ${removed} duplicate page(s). Active page: ${this.activeIndex}`);
    return removed;
  }

  // ---------- Focus ----------

  /**
   * Bring the page's window to the front and give it a moment to become
   * interactive. Returns false only when the page could not be raised.
   */
  private async ensureFocus(page: PageHandle): Promise<boolean> {
    try {
      await page.bringToFront();
    } catch (err) {
      log.warn('bringToFront failed', { error: errorMessage(err) });
      return false;
    }
    try {
      await page.waitForLoadState('domcontentloaded', { timeout: FOCUS_READY_TIMEOUT_MS });
    } catch (err) {
      log.debug('Page not ready after focus, continuing', { error: errorMessage(err) });
    }
    return true;
  }

  private async withFocusedPage(action: string, fn: (page: PageHandle) => Promise<void>): Promise<Outcome> {
    await this.ready();
    const page = this.activePage();
    if (!page) {
      log.debug(`${action} ignored: no live page`);
      return refused('unavailable');
    }

    await this.ensureFocus(page);
    try {
      await fn(page);
      return succeeded();
    } catch (err) {
      log.warn(`${action} failed`, { error: errorMessage(err), page: this.activeIndex });
      return failed(err);
    }
  }

  // ---------- Screenshots ----------

  getViewportSize(): [number, number] {
    return [this.viewport.width, this.viewport.height];
  }

  /**
   * Capture the active page as base64 JPEG. Never rejects: a failed capture
   * yields the error frame, the placeholder browser its own frame.
   */
  async getScreenshot(): Promise<string> {
    await this.ready();
    const page = this.activePage();
    if (!page) {
      return this.noticeFrame('placeholder', placeholderFrame(this.viewport.width, this.viewport.height));
    }

    try {
      await this.settle(page);
      this.syncViewport(page);
      const image = await page.screenshot({ type: 'jpeg', quality: this.options.jpegQuality, fullPage: false });
      return image.toString('base64');
    } catch (err) {
      log.warn('Screenshot error', { error: errorMessage(err) });
      return this.noticeFrame('error', ERROR_FRAME);
    }
  }

  private async settle(page: PageHandle): Promise<void> {
    try {
      await page.waitForLoadState('networkidle', { timeout: NETWORK_IDLE_TIMEOUT_MS });
      return;
    } catch {
      log.debug('Network still busy, waiting for the DOM instead');
    }
    try {
      await page.waitForLoadState('domcontentloaded', { timeout: DOM_READY_TIMEOUT_MS });
    } catch {
      log.debug('DOM not ready, capturing anyway');
    }
  }

  private syncViewport(page: PageHandle): void {
    const size = page.viewportSize();
    if (size && (size.width !== this.viewport.width || size.height !== this.viewport.height)) {
      log.info(`Viewport changed to ${size.width}x${size.height}`);
      this.viewport = { width: size.width, height: size.height };
    }
  }

  private noticeFrame(key: string, frame: NoticeFrame): Promise<string> {
    let cached = this.frames.get(key);
    if (!cached) {
      cached = this.renderFrame(frame).then(
        (image) => image.toString('base64'),
        (err: unknown) => {
          log.error(`Could not render the ${key} frame`, { error: errorMessage(err) });
          this.frames.delete(key);
          return '';
        },
      );
      this.frames.set(key, cached);
    }
    return cached;
  }

  // ---------- Input ----------

  mouseMove(x: number, y: number): Promise<Outcome> {
    return this.withFocusedPage('mouse_move', (page) => page.mouse.move(x, y));
  }

  /** Click, re-asserting focus and retrying once if the first attempt throws. */
  async mouseClick(x: number, y: number, button: MouseButton = 'left'): Promise<Outcome> {
    await this.ready();
    const page = this.activePage();
    if (!page) return refused('unavailable');

    await this.ensureFocus(page);
    try {
      await page.mouse.click(x, y, { button });
      return succeeded();
    } catch (err) {
      log.warn(`Click at (${x}, ${y}) failed, refocusing and retrying`, { error: errorMessage(err) });
    }

    await this.ensureFocus(page);
    try {
      await page.mouse.click(x, y, { button });
      return succeeded();
    } catch (err) {
      log.warn(`Click at (${x}, ${y}) failed after retry`, { error: errorMessage(err) });
      return failed(err);
    }
  }

  mouseDown(x: number, y: number, button: MouseButton = 'left'): Promise<Outcome> {
    return this.withFocusedPage('mouse_down', async (page) => {
      await page.mouse.move(x, y);
      await page.mouse.down({ button });
    });
  }

  mouseUp(x: number, y: number, button: MouseButton = 'left'): Promise<Outcome> {
    return this.withFocusedPage('mouse_up', async (page) => {
      await page.mouse.move(x, y);
      await page.mouse.up({ button });
    });
  }

  mouseWheel(deltaX: number, deltaY: number): Promise<Outcome> {
    return this.withFocusedPage('mouse_wheel', (page) => page.mouse.wheel(deltaX, deltaY));
  }

  keyboardPress(key: string): Promise<Outcome> {
    return this.withFocusedPage('key_press', (page) => page.keyboard.press(key));
  }

  keyboardType(text: string): Promise<Outcome> {
    return this.withFocusedPage('key_type', (page) => page.keyboard.type(text));
  }

  // ---------- Navigation ----------

  async navigateTo(rawUrl: string): Promise<Outcome> {
    const url = normalizeUrl(rawUrl);
    if (!url) return refused('invalid_url');

    await this.ready();
    const page = this.activePage();
    if (!page) return refused('unavailable');

    try {
      await page.goto(url);
      return succeeded();
    } catch (err) {
      log.warn(`Navigation to ${url} failed`, { error: errorMessage(err) });
      return failed(err);
    }
  }

  goBack(): Promise<Outcome> {
    return this.history('go_back', (page) => page.goBack());
  }

  goForward(): Promise<Outcome> {
    return this.history('go_forward', (page) => page.goForward());
  }

  refresh(): Promise<Outcome> {
    return this.history('refresh', (page) => page.reload());
  }

  private async history(action: string, fn: (page: PageHandle) => Promise<unknown>): Promise<Outcome> {
    await this.ready();
    const page = this.activePage();
    if (!page) return refused('unavailable');
    try {
      await fn(page);
      return succeeded();
    } catch (err) {
      log.warn(`${action} failed`, { error: errorMessage(err) });
      return failed(err);
    }
  }

  // ---------- Tabs ----------

  getActiveIndex(): number {
    return this.activeIndex;
  }

  async getPagesInfo(): Promise<PageInfo[]> {
    await this.ready();
    return this.exclusive(() => {
      this.dedupe();
      return this.pages.map((entry, index) => {
        const url = this.urlOf(entry);
        return {
          index,
          url,
          title: entry.kind === 'placeholder' ? 'Placeholder Page' : guessPageTitle(url),
          active: index === this.activeIndex,
        };
      });
    });
  }

  /** Returns the number of entries dropped. */
  async cleanupDuplicatePages(): Promise<number> {
    await this.ready();
    return this.exclusive(() => this.dedupe());
  }

  /**
   * Make a page active. The index is switched whenever it is in range; the
   * outcome reports whether the page could also be focused.
   */
  async switchToPage(index: number): Promise<Outcome> {
    await this.ready();
    return this.exclusive(async () => {
      if (!Number.isInteger(index) || index < 0 || index >= this.pages.length) {
        return refused('out_of_range');
      }
      this.activeIndex = index;
      const page = this.liveHandle(this.pages[index]);
      log.info(`Switched to page ${index}: ${page ? page.url() : PLACEHOLDER_URL}`);
      if (!page) return succeeded();
      return (await this.ensureFocus(page)) ? succeeded() : failed(new Error(`Page ${index} could not be focused`));
    });
  }

  async closePage(index: number): Promise<Outcome> {
    await this.ready();
    return this.exclusive(async () => {
      if (!Number.isInteger(index) || index < 0 || index >= this.pages.length) {
        return refused('out_of_range');
      }
      if (this.pages.length <= 1) {
        return refused('last_page');
      }

      const page = this.liveHandle(this.pages[index]);
      if (page) {
        try {
          await page.close();
        } catch (err) {
          log.warn(`Closing page ${index} failed`, { error: errorMessage(err) });
          return failed(err);
        }
      }

      this.removeAt(index);
      log.info(`Closed page ${index}. Active page: ${this.activeIndex}`);
      const active = this.activePage();
      if (active) await this.ensureFocus(active);
      return succeeded();
    });
  }

  /**
   * Open a tab on the new-tab URL, or switch to one already showing it.
   * A call made while another is still running is refused.
   */
  async addNewTab(): Promise<Outcome> {
    if (this.creatingTab) {
      log.info('Tab creation already in progress');
      return refused('in_progress');
    }
    this.creatingTab = true;
    try {
      await this.ready();
      return await this.exclusive(() => this.openTab());
    } finally {
      this.creatingTab = false;
    }
  }

  private async openTab(): Promise<Outcome> {
    if (this.state.kind !== 'live') {
      log.info('Cannot add a tab to the placeholder browser');
      return refused('unavailable');
    }

    const target = this.options.newTabUrl;
    const existing = this.pages.findIndex((entry) => this.urlOf(entry) === target);
    if (existing !== -1) {
      log.info(`Tab for ${target} already open at ${existing}, switching to it`);
      this.activeIndex = existing;
      const page = this.activePage();
      if (page) await this.ensureFocus(page);
      return succeeded();
    }

    try {
      const page = await this.state.context.newPage();
      await page.goto(target);
      this.pages.push({ kind: 'live', handle: page });
      this.activeIndex = this.pages.length - 1;
      this.watchClose(page);
      await this.ensureFocus(page);
      log.info(`Added new tab. Total pages: ${this.pages.length}`);
      return succeeded();
    } catch (err) {
      log.error('Error adding new tab', { error: errorMessage(err) });
      return failed(err);
    }
  }
}
