/**
 * The slice of Playwright's page and context API the tab controller drives.
 * Playwright's `Page` and `BrowserContext` satisfy these structurally; tests
 * substitute in-process fakes.
 */

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export type MouseButton = 'left' | 'right' | 'middle';

export interface ViewportSize {
  width: number;
  height: number;
}

export interface PointerInput {
  move(x: number, y: number): Promise<void>;
  click(x: number, y: number, options?: { button?: MouseButton }): Promise<void>;
  down(options?: { button?: MouseButton }): Promise<void>;
  up(options?: { button?: MouseButton }): Promise<void>;
  wheel(deltaX: number, deltaY: number): Promise<void>;
}

export interface KeyInput {
  press(key: string): Promise<void>;
  type(text: string): Promise<void>;
}

export interface PageHandle {
  readonly mouse: PointerInput;
  readonly keyboard: KeyInput;
  url(): string;
  isClosed(): boolean;
  bringToFront(): Promise<void>;
  waitForLoadState(state?: LoadState, options?: { timeout?: number }): Promise<void>;
  screenshot(options?: { type?: 'jpeg' | 'png'; quality?: number; fullPage?: boolean }): Promise<Buffer>;
  viewportSize(): ViewportSize | null;
  goto(url: string): Promise<unknown>;
  goBack(): Promise<unknown>;
  goForward(): Promise<unknown>;
  reload(): Promise<unknown>;
  close(): Promise<void>;
  once(event: 'close', listener: () => void): unknown;
}

export interface ContextHandle {
  pages(): PageHandle[];
  newPage(): Promise<PageHandle>;
  on(event: 'page', listener: (page: PageHandle) => void): unknown;
  close(): Promise<void>;
}

/** One row of the `pages_info` payload. */
export interface PageInfo {
  index: number;
  url: string;
  title: string;
  active: boolean;
}
