/**
 * Synthetic frames streamed when no real screenshot is available: the
 * placeholder browser, or a capture that failed.
 */

import sharp from 'sharp';

export interface NoticeFrame {
  width: number;
  height: number;
  background: string;
  lines: Array<{ text: string; color: string }>;
}

export type FrameRenderer = (frame: NoticeFrame) => Promise<Buffer>;

export const ERROR_FRAME: NoticeFrame = {
  width: 800,
  height: 600,
  background: '#d3d3d3',
  lines: [
    { text: 'Browser Error - Check Console', color: '#cc0000' },
    { text: 'Screenshot failed to capture', color: '#000000' },
  ],
};

export function placeholderFrame(width: number, height: number): NoticeFrame {
  return {
    width,
    height,
    background: '#ffffff',
    lines: [
      { text: 'Placeholder Browser - Chromium could not be launched', color: '#1a4fd6' },
      { text: 'Input is ignored until the server is restarted with a working browser', color: '#000000' },
      { text: 'Check the server log for the launch errors', color: '#808080' },
    ],
  };
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function noticeSvg(frame: NoticeFrame): string {
  const text = frame.lines
    .map(
      (line, i) =>
        `<text x="50" y="${60 + i * 50}" font-family="sans-serif" font-size="24" fill="${line.color}">${escapeXml(line.text)}</text>`,
    )
    .join('');
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${frame.width}" height="${frame.height}">` +
    `<rect width="100%" height="100%" fill="${frame.background}"/>${text}</svg>`
  );
}

/** Rasterise a notice frame to JPEG. */
export const renderNoticeFrame: FrameRenderer = async (frame) =>
  sharp(Buffer.from(noticeSvg(frame))).jpeg({ quality: 80 }).toBuffer();
