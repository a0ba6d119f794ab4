import { createInterface } from "node:readline";

export type EditResult = { changed: true; text: string } | { changed: false };

const FINISH = ".";
const CANCEL = ":q";

export const EDITOR_HELP = `Type the new source. End with a line containing only "${FINISH}", or "${CANCEL}" to keep the current source.`;

const numbered = (source: string): string[] => {
  const lines = source.endsWith("\n") ? source.slice(0, -1).split("\n") : source.split("\n");
  const width = `${lines.length}`.length;
  return lines.map((line, index) => `${`${index + 1}`.padStart(width)} | ${line}`);
};

/**
 * Modal source editor over a line stream. Resolves with the replacement
 * text, or "no change" when the user cancels or input ends before any line
 * was typed.
 */
export const editSource = async ({
  current,
  input,
  output,
}: {
  current: string;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}): Promise<EditResult> => {
  output.write(["Current source:", ...numbered(current), "", EDITOR_HELP, ""].join("\n"));

  const reader = createInterface({ input, terminal: false });
  const lines: string[] = [];
  let finished = false;

  try {
    for await (const line of reader) {
      if (line === CANCEL) return { changed: false };
      if (line === FINISH) {
        finished = true;
        break;
      }
      lines.push(line);
    }
  } finally {
    reader.close();
  }

  if (!finished && lines.length === 0) return { changed: false };
  return { changed: true, text: lines.map((line) => `${line}\n`).join("") };
};
