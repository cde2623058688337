import blessed from "blessed";
import type { Widgets } from "blessed";
import { AsyncQueue } from "./channel.js";
import { ChatMessage, Key, MessageRole, Phase } from "./controller.js";

export type TerminalSize = {
  columns: number;
  rows: number;
};

/** What the interactive loop needs from a terminal. */
export type TerminalIo = {
  readonly keys: AsyncQueue<Key>;
  size(): TerminalSize;
  draw(frame: Frame): void;
  enter(): void;
  restore(): void;
};

export type FrameView = {
  readonly messages: readonly ChatMessage[];
  readonly input: string;
  readonly prompt: string;
  readonly status: string | null;
  readonly phase: Phase;
  readonly isProcessing: boolean;
  readonly scrollOffset: number;
};

export type FrameOptions = {
  color: boolean;
  /** Advances the spinner. */
  tick: number;
};

/** Content for each screen region, already tagged for blessed. */
export type Frame = {
  header: string;
  chat: string[];
  status: string;
  inputLabel: string;
  input: string;
  /** Largest scroll offset that still shows a full chat window. */
  maxScroll: number;
};

/** The subset of a blessed keypress that `toKey` reads. */
export type KeyPress = {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
};

const SPINNER = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

const ROLE_LABELS: Record<MessageRole, string> = {
  user: "You",
  assistant: "Researcher",
  system: "System",
};

const PHASE_LABELS: Record<Phase, string> = {
  idle: "ready",
  awaiting_clarification: "starting",
  clarifying: "clarifying",
  confirming: "confirming",
  researching: "researching",
  completed: "done",
  error: "error",
};

// Header, status line and the bordered input box.
const CHROME_ROWS = 5;
const INPUT_ROWS = 3;

type Paint = {
  bold: (text: string) => string;
  faint: (text: string) => string;
  key: (text: string) => string;
  role: (role: MessageRole, text: string) => string;
};

const ROLE_COLORS: Record<MessageRole, string> = {
  user: "cyan-fg",
  assistant: "green-fg",
  system: "yellow-fg",
};

function painter(useColor: boolean): Paint {
  const tag = (name: string, text: string) => (useColor ? `{${name}}${text}{/${name}}` : text);
  return {
    bold: (text) => tag("bold", text),
    faint: (text) => tag("gray-fg", text),
    key: (text) => tag("yellow-fg", text),
    role: (role, text) => tag(ROLE_COLORS[role], text),
  };
}

const PLAIN = painter(false);

/** Escapes blessed tag braces in user and worker text. */
function escapeTags(text: string): string {
  const escaped: string = blessed.escape(text);
  return escaped;
}

/** Renders the chat log as display lines: a role label, the indented body, a blank line. */
export function chatLines(
  messages: readonly ChatMessage[],
  width: number,
  paint: Paint = PLAIN
): string[] {
  const bodyWidth = Math.max(10, width - 2);
  const out: string[] = [];
  for (const message of messages) {
    out.push(paint.role(message.role, ROLE_LABELS[message.role]));
    for (const line of wrapText(message.content, bodyWidth)) {
      const body = `  ${escapeTags(line)}`;
      out.push(message.role === "system" ? paint.faint(body) : body);
    }
    out.push("");
  }
  return out;
}

/** Shown in place of the chat log before the first message. */
export function welcomeLines(paint: Paint = PLAIN): string[] {
  const center = (text: string) => `{center}${text}{/center}`;
  return [
    "",
    center(paint.bold("Welcome to sounder")),
    "",
    center(paint.faint("Enter a research query below to get started.")),
    "",
    center(
      `${paint.faint("Press ")}${paint.key("Enter")}${paint.faint(" to submit, ")}${paint.key("Esc")}${paint.faint(" to quit")}`
    ),
  ];
}

export function renderFrame(view: FrameView, size: TerminalSize, options: FrameOptions): Frame {
  const paint = painter(options.color);
  const width = Math.max(20, size.columns);
  const chatHeight = Math.max(1, size.rows - CHROME_ROWS);
  const spinner = view.isProcessing ? SPINNER[options.tick % SPINNER.length] : " ";

  const header = paint.bold(fitLine(`${spinner} sounder · ${PHASE_LABELS[view.phase]}`, width));

  const chat =
    view.messages.length === 0 ? welcomeLines(paint) : chatLines(view.messages, width, paint);
  const maxScroll = Math.max(0, chat.length - chatHeight);
  const offset = Math.min(view.scrollOffset, maxScroll);
  const end = chat.length - offset;
  const visible = chat.slice(Math.max(0, end - chatHeight), end);

  const status = view.status ? paint.faint(escapeTags(fitLine(view.status, width))) : "";

  // Border and one column of padding on each side.
  const innerWidth = width - 4;
  const field = `> ${view.input}`;
  const shown = field.length > innerWidth ? field.slice(field.length - innerWidth) : field;

  return {
    header,
    chat: visible,
    status,
    inputLabel: ` ${view.prompt} `,
    input: escapeTags(shown),
    maxScroll,
  };
}

function fitLine(text: string, width: number): string {
  const single = text.replace(/\s*\n\s*/g, " ");
  return single.length <= width ? single : `${single.slice(0, width - 1)}…`;
}

export function wrapText(text: string, width: number): string[] {
  const out: string[] = [];
  const rawLines = text.split("\n");
  for (const raw of rawLines) {
    const line = raw.replace(/\r/g, "");
    if (line.length === 0) {
      out.push("");
      continue;
    }
    if (line.length <= width) {
      out.push(line);
      continue;
    }
    const words = line.split(/(\s+)/).filter((w) => w.length > 0);
    let current = "";
    for (const w of words) {
      const next = current ? current + w : w;
      if (next.length <= width) {
        current = next;
        continue;
      }
      if (current) {
        out.push(current.trimEnd());
      }
      // A token longer than the width is hard-split.
      if (w.length > width) {
        for (let i = 0; i < w.length; i += width) {
          out.push(w.slice(i, i + width));
        }
        current = "";
      } else {
        current = w.trimStart();
      }
    }
    if (current) {
      out.push(current.trimEnd());
    }
  }
  return out;
}

/**
 * Maps a blessed keypress to a Controller key; null for keys it ignores.
 * Ctrl+C and Ctrl+D are bound separately on the screen.
 */
export function toKey(ch: string | undefined, key: KeyPress | undefined): Key | null {
  if (key?.ctrl || key?.meta) {
    return null;
  }
  switch (key?.name) {
    // blessed follows every "return" with an "enter" keypress.
    case "enter":
      return { name: "enter" };
    case "backspace":
      return { name: "backspace" };
    case "escape":
      return { name: "escape" };
    case "up":
      return { name: "up" };
    case "down":
      return { name: "down" };
    default:
      break;
  }
  if (!ch || /[\x00-\x1f\x7f]/.test(ch)) {
    return null;
  }
  return { name: "char", char: ch };
}

type Regions = {
  screen: Widgets.Screen;
  header: Widgets.BoxElement;
  chat: Widgets.BoxElement;
  status: Widgets.BoxElement;
  input: Widgets.BoxElement;
};

/**
 * A blessed screen split into header, chat log, status line and input box.
 * Key presses land on `keys`; nothing here blocks.
 */
export class Terminal implements TerminalIo {
  readonly keys = new AsyncQueue<Key>();
  private readonly input: NodeJS.ReadStream;
  private readonly output: NodeJS.WriteStream;
  private regions: Regions | null = null;

  constructor(input: NodeJS.ReadStream = process.stdin, output: NodeJS.WriteStream = process.stdout) {
    this.input = input;
    this.output = output;
  }

  private readonly onEnd = () => {
    this.keys.close();
  };

  size(): TerminalSize {
    return {
      columns: this.output.columns || 80,
      rows: this.output.rows || 24,
    };
  }

  enter(): void {
    if (this.regions) {
      return;
    }
    const screen = blessed.screen({
      input: this.input,
      output: this.output,
      smartCSR: true,
      fullUnicode: true,
      title: "sounder",
    });

    const header = blessed.box({ parent: screen, top: 0, left: 0, width: "100%", height: 1, tags: true });
    const chat = blessed.box({
      parent: screen,
      top: 1,
      left: 0,
      width: "100%",
      height: `100%-${CHROME_ROWS}`,
      tags: true,
    });
    const status = blessed.box({
      parent: screen,
      bottom: INPUT_ROWS,
      left: 0,
      width: "100%",
      height: 1,
      tags: true,
    });
    const input = blessed.box({
      parent: screen,
      bottom: 0,
      left: 0,
      width: "100%",
      height: INPUT_ROWS,
      border: { type: "line" },
      padding: { left: 1, right: 1, top: 0, bottom: 0 },
      style: { border: { fg: "gray" } },
      tags: true,
    });

    screen.key(["C-c", "C-d"], () => {
      this.keys.push({ name: "interrupt" });
    });
    screen.on("keypress", (ch: string | undefined, key: Widgets.Events.IKeyEventArg | undefined) => {
      const mapped = toKey(ch, key);
      if (mapped) {
        this.keys.push(mapped);
      }
    });
    this.input.once("end", this.onEnd);

    this.regions = { screen, header, chat, status, input };
  }

  draw(frame: Frame): void {
    const regions = this.regions;
    if (!regions) {
      return;
    }
    regions.header.setContent(frame.header);
    regions.chat.setContent(frame.chat.join("\n"));
    regions.status.setContent(frame.status);
    regions.input.setLabel(frame.inputLabel);
    regions.input.setContent(frame.input);
    regions.screen.render();
  }

  restore(): void {
    const regions = this.regions;
    if (!regions) {
      return;
    }
    this.regions = null;
    this.input.off("end", this.onEnd);
    regions.screen.destroy();
    this.keys.close();
  }
}
