export function writeStdout(message: string): void {
  process.stdout.write(`${message}\n`);
}

export function writeStderr(message: string): void {
  process.stderr.write(`${message}\n`);
}

/** Reads all piped input; empty when stdin is a terminal. */
export async function readStdin(input: NodeJS.ReadStream = process.stdin): Promise<string> {
  if (input.isTTY) {
    return "";
  }
  input.setEncoding("utf8");
  let text = "";
  for await (const chunk of input) {
    text += String(chunk);
  }
  return text;
}
