import { optionalString } from '../args.js';
import type { Tool, ToolParameters, ToolContext, ToolResult } from '../types.js';

export interface CaptureRequest {
  /** Named window or screen region; whole screen when omitted */
  target?: string;
  workingDir: string;
}

export interface Capture {
  path: string;
  width?: number;
  height?: number;
}

export interface ScreenCapture {
  capture(request: CaptureRequest): Promise<Capture>;
}

export class TakeScreenshotTool implements Tool {
  name = 'take_screenshot';
  description = 'Capture the screen or a named window. Returns the path of the saved image.';
  parameters: ToolParameters = {
    type: 'object',
    properties: {
      target: { type: 'string', description: 'Window or region to capture; the whole screen when omitted' },
    },
    required: [],
  };

  constructor(private readonly capturer: ScreenCapture) {}

  async execute(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    try {
      const shot = await this.capturer.capture({ target: optionalString(args, 'target'), workingDir: context.workingDir });
      const size = shot.width && shot.height ? ` (${shot.width}x${shot.height})` : '';
      return {
        success: true,
        output: `Screenshot saved to ${shot.path}${size}`,
        metadata: { path: shot.path },
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, output: '', error: `Screenshot failed: ${message}` };
    }
  }
}
