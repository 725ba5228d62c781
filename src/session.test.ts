import { describe, expect, it, vi } from 'vitest';
import { RequestDebouncer } from './debounce.js';
import { ControlSession } from './session.js';
import type { TabController } from './tab-controller.js';
import { createController, FakeChannel, FakeContext, FakePage, START_URL } from '../test/fakes.js';

function createSession(controller: TabController, debounce = new RequestDebouncer(5000)) {
  const channel = new FakeChannel();
  const session = new ControlSession('test-session', channel, controller, {
    frameIntervalMs: 100,
    addTabDebounce: debounce,
  });
  return { session, channel };
}

async function liveSession(pages: FakePage[] = [new FakePage()]) {
  const context = new FakeContext(pages);
  const { controller } = createController(context);
  await controller.initialize();
  return { controller, context, ...createSession(controller) };
}

async function deliver(session: ControlSession, ...messages: unknown[]) {
  for (const message of messages) session.receive(JSON.stringify(message));
  await session.idle();
}

describe('ControlSession', () => {
  describe('message handling', () => {
    it('answers get_pages with the tab list', async () => {
      const { session, channel } = await liveSession();

      await deliver(session, { type: 'get_pages' });

      expect(channel.messages()).toEqual([
        { type: 'pages_info', pages: [{ index: 0, url: START_URL, title: 'Browser Tab', active: true }] },
      ]);
    });

    it('reports an out-of-range switch', async () => {
      const { session, channel, context } = await liveSession();
      context.openPopup('https://other.test/');

      await deliver(session, { type: 'switch_page', page_index: 5 });

      expect(channel.messages()).toEqual([{ type: 'page_switched', success: false, page_index: 5 }]);
    });

    it('confirms a switch', async () => {
      const { session, channel, controller, context } = await liveSession();
      context.openPopup('https://other.test/');

      await deliver(session, { type: 'switch_page', page_index: 0 });

      expect(channel.messages()).toEqual([{ type: 'page_switched', success: true, page_index: 0 }]);
      expect(controller.getActiveIndex()).toBe(0);
    });

    it('answers a fractional page index with a refusal', async () => {
      const { session, channel, context } = await liveSession();
      context.openPopup('https://other.test/');

      await deliver(session, { type: 'switch_page', page_index: 1.5 }, { type: 'close_page', page_index: 0.5 });

      expect(channel.messages()).toEqual([
        { type: 'page_switched', success: false, page_index: 1.5 },
        { type: 'page_closed', success: false, page_index: 0.5 },
      ]);
    });

    it('refuses to close the last page', async () => {
      const { session, channel } = await liveSession();

      await deliver(session, { type: 'close_page', page_index: 0 });

      expect(channel.messages()).toEqual([{ type: 'page_closed', success: false, page_index: 0 }]);
    });

    it('closes a page on request', async () => {
      const { session, channel, context } = await liveSession();
      const popup = context.openPopup('https://other.test/');

      await deliver(session, { type: 'close_page', page_index: 1 });

      expect(channel.messages()).toEqual([{ type: 'page_closed', success: true, page_index: 1 }]);
      expect(popup.close).toHaveBeenCalledTimes(1);
    });

    it('navigates with the https scheme added and sends nothing on success', async () => {
      const page = new FakePage();
      const { session, channel } = await liveSession([page]);

      await deliver(session, { type: 'navigate', url: 'example.com' });

      expect(page.goto).toHaveBeenLastCalledWith('https://example.com');
      expect(channel.messages()).toEqual([]);
    });

    it('reports a failed navigation', async () => {
      const page = new FakePage();
      const { session, channel } = await liveSession([page]);
      page.goto.mockRejectedValueOnce(new Error('net::ERR_NAME_NOT_RESOLVED'));

      await deliver(session, { type: 'navigate', url: 'nowhere.test' });

      expect(channel.messages()).toEqual([
        { type: 'error', operation: 'navigate', message: 'net::ERR_NAME_NOT_RESOLVED' },
      ]);
    });

    it('reports a blank navigation target', async () => {
      const { session, channel } = await liveSession();

      await deliver(session, { type: 'navigate' });

      expect(channel.messages()).toEqual([{ type: 'error', operation: 'navigate', message: 'invalid_url' }]);
    });

    it('fills in defaults for missing input fields', async () => {
      const page = new FakePage();
      const { session } = await liveSession([page]);

      await deliver(session, { type: 'mouse_click' }, { type: 'mouse_wheel', deltaY: 240 });

      expect(page.mouse.click).toHaveBeenCalledWith(0, 0, { button: 'left' });
      expect(page.mouse.wheel).toHaveBeenCalledWith(0, 240);
    });

    it('skips empty key input', async () => {
      const page = new FakePage();
      const { session } = await liveSession([page]);

      await deliver(session, { type: 'key_press' }, { type: 'key_press', key: '' }, { type: 'key_type', text: '' });

      expect(page.keyboard.press).not.toHaveBeenCalled();
      expect(page.keyboard.type).not.toHaveBeenCalled();
    });

    it('handles messages in arrival order', async () => {
      const page = new FakePage();
      const { session } = await liveSession([page]);

      await deliver(
        session,
        { type: 'mouse_down', x: 3, y: 4 },
        { type: 'mouse_up', x: 3, y: 4 },
        { type: 'key_type', text: 'a' },
      );

      const [down] = page.mouse.down.mock.invocationCallOrder;
      const [up] = page.mouse.up.mock.invocationCallOrder;
      const [typed] = page.keyboard.type.mock.invocationCallOrder;
      expect(down).toBeLessThan(up);
      expect(up).toBeLessThan(typed);
    });

    it('drops duplicates before listing pages on refresh_pages', async () => {
      const { session, channel, context } = await liveSession();
      const popup = context.openPopup('https://other.test/');
      popup.currentUrl = START_URL;

      await deliver(session, { type: 'refresh_pages' });

      expect(channel.messages()).toEqual([
        { type: 'pages_info', pages: [{ index: 0, url: START_URL, title: 'Browser Tab', active: true }] },
      ]);
    });

    it('runs history commands', async () => {
      const page = new FakePage();
      const { session } = await liveSession([page]);

      await deliver(session, { type: 'go_back' }, { type: 'go_forward' }, { type: 'refresh' });

      expect(page.goBack).toHaveBeenCalledTimes(1);
      expect(page.goForward).toHaveBeenCalledTimes(1);
      expect(page.reload).toHaveBeenCalledTimes(1);
    });
  });

  describe('bad input', () => {
    it('ignores unknown types and keeps going', async () => {
      const { session, channel } = await liveSession();

      await deliver(session, { type: 'teleport' }, { type: 'get_pages' });

      expect(channel.messages()).toHaveLength(1);
    });

    it('ignores malformed frames and keeps going', async () => {
      const page = new FakePage();
      const { session, channel } = await liveSession([page]);

      session.receive('{not json');
      session.receive(JSON.stringify({ type: 'mouse_move', x: 'left' }));
      session.receive(JSON.stringify({ type: 'get_pages' }));
      await session.idle();

      expect(page.mouse.move).not.toHaveBeenCalled();
      expect(channel.messages()).toHaveLength(1);
    });

    it('survives a send failure', async () => {
      const { session, channel } = await liveSession();
      channel.send.mockRejectedValueOnce(new Error('socket closed'));

      await deliver(session, { type: 'get_pages' }, { type: 'get_pages' });

      expect(channel.send).toHaveBeenCalledTimes(2);
      expect(channel.messages()).toHaveLength(1);
    });
  });

  describe('after stop', () => {
    it('drops queued input once the session has ended', async () => {
      const page = new FakePage();
      const { session, channel } = await liveSession([page]);
      let release: () => void = () => {};
      page.goto.mockImplementationOnce(
        (url: string) =>
          new Promise<null>((resolve) => {
            release = () => {
              page.currentUrl = url;
              resolve(null);
            };
          }),
      );

      session.receive(JSON.stringify({ type: 'navigate', url: 'slow.test' }));
      session.receive(JSON.stringify({ type: 'mouse_click', x: 1, y: 2 }));
      session.receive(JSON.stringify({ type: 'key_type', text: 'abc' }));
      session.receive(JSON.stringify({ type: 'get_pages' }));
      await vi.waitFor(() => expect(page.goto).toHaveBeenLastCalledWith('https://slow.test'));

      channel.open = false;
      session.stop();
      release();
      await session.idle();

      expect(page.mouse.click).not.toHaveBeenCalled();
      expect(page.keyboard.type).not.toHaveBeenCalled();
      expect(channel.send).not.toHaveBeenCalled();
    });

    it('does not relaunch a closed browser for queued messages', async () => {
      const { controller, launch } = createController(new FakeContext());
      await controller.initialize();
      const { session } = createSession(controller);

      session.stop();
      await controller.close();
      await deliver(session, { type: 'mouse_move', x: 1, y: 1 });

      expect(launch).toHaveBeenCalledTimes(1);
      expect(controller.getMode()).toBe('idle');
    });
  });

  describe('add_tab', () => {
    it('debounces repeated requests', async () => {
      const now = vi.fn<() => number>().mockReturnValueOnce(1000).mockReturnValueOnce(3000).mockReturnValueOnce(6500);
      const context = new FakeContext([new FakePage()]);
      const { controller } = createController(context);
      await controller.initialize();
      const { session, channel } = createSession(controller, new RequestDebouncer(5000, now));

      await deliver(session, { type: 'add_tab' }, { type: 'add_tab' }, { type: 'add_tab' });

      expect(channel.messages()).toEqual([
        { type: 'tab_added', success: true },
        { type: 'tab_added', success: false, reason: 'duplicate_request' },
        { type: 'tab_added', success: true },
      ]);
      expect(context.newPage).toHaveBeenCalledTimes(1);
    });

    it('shares the debounce between sessions', async () => {
      const context = new FakeContext([new FakePage()]);
      const { controller } = createController(context);
      await controller.initialize();
      const debounce = new RequestDebouncer(5000);
      const first = createSession(controller, debounce);
      const second = createSession(controller, debounce);

      await deliver(first.session, { type: 'add_tab' });
      await deliver(second.session, { type: 'add_tab' });

      expect(first.channel.messages()).toEqual([{ type: 'tab_added', success: true }]);
      expect(second.channel.messages()).toEqual([{ type: 'tab_added', success: false, reason: 'duplicate_request' }]);
    });

    it('passes the refusal reason through', async () => {
      const { controller } = createController(null);
      const { session, channel } = createSession(controller);

      await deliver(session, { type: 'add_tab' });

      expect(channel.messages()).toEqual([{ type: 'tab_added', success: false, reason: 'unavailable' }]);
    });

    it('reports a failed tab creation', async () => {
      const { session, channel, context } = await liveSession();
      context.newPage.mockRejectedValueOnce(new Error('context closed'));

      await deliver(session, { type: 'add_tab' });

      expect(channel.messages()).toEqual([{ type: 'tab_added', success: false }]);
    });
  });

  describe('screenshot stream', () => {
    function slowCapture(controller: TabController, latencyMs: number) {
      const stats = { inFlight: 0, maxInFlight: 0 };
      const capture = vi.spyOn(controller, 'getScreenshot').mockImplementation(async () => {
        stats.inFlight += 1;
        stats.maxInFlight = Math.max(stats.maxInFlight, stats.inFlight);
        await new Promise((resolve) => setTimeout(resolve, latencyMs));
        stats.inFlight -= 1;
        return 'frame';
      });
      return { capture, stats };
    }

    it('sends frames one at a time with the interval between them', async () => {
      vi.useFakeTimers();
      const { controller } = createController(new FakeContext());
      const { capture, stats } = slowCapture(controller, 250);
      const { session, channel } = createSession(controller);

      session.start();
      await vi.advanceTimersByTimeAsync(1000);

      // captures finish at 250, 600 and 950ms
      expect(session.frameCount).toBe(3);
      expect(capture).toHaveBeenCalledTimes(3);
      expect(stats.maxInFlight).toBe(1);
      expect(channel.messages()[0]).toEqual({ type: 'screenshot', data: 'frame', viewport: [1920, 1080] });

      session.stop();
      await vi.advanceTimersByTimeAsync(250);
      await session.finished();
    });

    it('stops sending once stopped', async () => {
      vi.useFakeTimers();
      const { controller } = createController(new FakeContext());
      const { capture } = slowCapture(controller, 250);
      const { session } = createSession(controller);

      session.start();
      await vi.advanceTimersByTimeAsync(250);
      expect(session.frameCount).toBe(1);

      session.stop();
      await vi.advanceTimersByTimeAsync(1000);
      await session.finished();

      expect(session.frameCount).toBe(1);
      expect(capture).toHaveBeenCalledTimes(1);
      expect(session.active).toBe(false);
    });

    it('discards a capture that finishes after the session ends', async () => {
      vi.useFakeTimers();
      const { controller } = createController(new FakeContext());
      slowCapture(controller, 250);
      const { session, channel } = createSession(controller);

      session.start();
      await vi.advanceTimersByTimeAsync(100);
      session.stop();
      await vi.advanceTimersByTimeAsync(200);
      await session.finished();

      expect(channel.send).not.toHaveBeenCalled();
    });

    it('ends when the channel closes', async () => {
      vi.useFakeTimers();
      const { controller } = createController(new FakeContext());
      const { capture } = slowCapture(controller, 250);
      const { session, channel } = createSession(controller);

      session.start();
      await vi.advanceTimersByTimeAsync(250);
      channel.open = false;
      await vi.advanceTimersByTimeAsync(1000);
      await session.finished();

      expect(session.frameCount).toBe(1);
      expect(capture).toHaveBeenCalledTimes(2);
    });

    it('ends when a frame cannot be sent', async () => {
      vi.useFakeTimers();
      const { controller } = createController(new FakeContext());
      const { capture } = slowCapture(controller, 250);
      const { session, channel } = createSession(controller);
      channel.send.mockRejectedValueOnce(new Error('socket closed'));

      session.start();
      await vi.advanceTimersByTimeAsync(1000);
      await session.finished();

      expect(session.frameCount).toBe(0);
      expect(capture).toHaveBeenCalledTimes(1);
    });
  });
});
