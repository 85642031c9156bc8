import t from "tap";
import { LineSplitter } from "../src/line-splitter.js";

t.test("LineSplitter", async (t) => {
  await t.test("should split on newlines and CRLF", async (t) => {
    const splitter = new LineSplitter();

    t.same(splitter.push("a\nb\r\nc"), [
      { text: "a", transient: false },
      { text: "b", transient: false },
    ]);
    t.same(splitter.flush(), [{ text: "c", transient: false }]);
    t.same(splitter.flush(), []);
  });

  await t.test("should mark carriage-return lines transient", async (t) => {
    const splitter = new LineSplitter();

    t.same(splitter.push("\r 10%|#\r 20%|##"), [
      { text: " 10%|#", transient: true },
    ]);
    t.same(splitter.push("\n"), [{ text: " 20%|##", transient: false }]);
  });

  await t.test("should join CRLF split across chunks", async (t) => {
    const splitter = new LineSplitter();

    t.same(splitter.push("done\r"), []);
    t.same(splitter.push("\nnext\n"), [
      { text: "done", transient: false },
      { text: "next", transient: false },
    ]);
  });

  await t.test("should flush a final carriage-return line", async (t) => {
    const splitter = new LineSplitter();

    t.same(splitter.push("abc\r"), []);
    t.same(splitter.flush(), [{ text: "abc", transient: false }]);
  });

  await t.test("should keep empty lines", async (t) => {
    const splitter = new LineSplitter();

    t.same(splitter.push("\n\n"), [
      { text: "", transient: false },
      { text: "", transient: false },
    ]);
  });
});
