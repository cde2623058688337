import { AsyncQueue } from "./channel.js";
import { AppEvent, Controller, ControllerCommand } from "./controller.js";
import { Launcher } from "./exec.js";
import { SessionOrchestrator } from "./orchestrator.js";
import { renderFrame, Terminal, TerminalIo } from "./tui.js";
import { Config } from "./types.js";

export const TICK_MS = 50;

export type InteractiveOptions = {
  cwd?: string;
  launch?: Launcher;
  terminal?: TerminalIo;
  color?: boolean;
  tickMs?: number;
  createRunId?: () => string;
};

/**
 * The interactive session: one loop that drains orchestrator events into the
 * Controller, redraws, then waits at most one tick for a key. Returns the
 * process exit code once the user quits.
 */
export async function runInteractive(
  config: Config,
  options: InteractiveOptions = {}
): Promise<number> {
  const terminal = options.terminal ?? new Terminal();
  const color = options.color ?? !process.env.NO_COLOR;
  const tickMs = options.tickMs ?? TICK_MS;

  const events = new AsyncQueue<AppEvent>();
  const commands = new AsyncQueue<ControllerCommand>();
  const controller = new Controller(commands, { autoDecide: config.request.auto_decide });
  const orchestrator = new SessionOrchestrator({
    config,
    events,
    cwd: options.cwd,
    launch: options.launch,
    createRunId: options.createRunId,
  });
  const consuming = orchestrator.consume(commands);

  terminal.enter();
  try {
    let tick = 0;
    while (!controller.shouldQuit) {
      controller.applyEvents(events.drain());
      const frame = renderFrame(controller, terminal.size(), { color, tick });
      controller.clampScroll(frame.maxScroll);
      terminal.draw(frame);

      const key = await terminal.keys.poll(tickMs);
      if (key) {
        controller.handleKey(key);
        for (const queued of terminal.keys.drain()) {
          controller.handleKey(queued);
        }
      } else if (terminal.keys.isClosed) {
        // Input is gone; nothing can ever be typed again.
        controller.handleKey({ name: "interrupt" });
      }
      tick += 1;
    }
  } finally {
    commands.close();
    try {
      await consuming;
      await orchestrator.shutdown();
    } finally {
      terminal.restore();
    }
  }
  return 0;
}
