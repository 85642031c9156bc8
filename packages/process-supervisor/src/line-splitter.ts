export interface SplitLine {
  text: string;
  /** Ended with a bare carriage return; the next line overwrites it */
  transient: boolean;
}

/**
 * Splits a decoded output stream into lines on `\n`, `\r\n` and bare `\r`.
 * Progress bars redraw themselves with bare carriage returns, so those lines
 * are marked transient.
 */
export class LineSplitter {
  private buffer = "";

  push(chunk: string): SplitLine[] {
    this.buffer += chunk;
    const lines: SplitLine[] = [];
    let start = 0;

    for (let i = 0; i < this.buffer.length; i++) {
      const char = this.buffer[i];

      if (char === "\n") {
        const end = i > start && this.buffer[i - 1] === "\r" ? i - 1 : i;
        lines.push({ text: this.buffer.slice(start, end), transient: false });
        start = i + 1;
      } else if (char === "\r") {
        // Wait for the next chunk to tell `\r\n` from a bare `\r`
        if (i === this.buffer.length - 1) break;
        if (this.buffer[i + 1] === "\n") continue;

        const text = this.buffer.slice(start, i);
        if (text !== "") {
          lines.push({ text, transient: true });
        }
        start = i + 1;
      }
    }

    this.buffer = this.buffer.slice(start);
    return lines;
  }

  /** Returns whatever is left once the stream has ended. */
  flush(): SplitLine[] {
    const text = this.buffer.replace(/\r$/, "");
    this.buffer = "";
    return text === "" ? [] : [{ text, transient: false }];
  }
}
