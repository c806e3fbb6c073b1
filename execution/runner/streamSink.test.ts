import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { LineSplitter, createBufferSink, createTeeSink, createWritableSink } from "./streamSink.js";
import { PassThrough } from "node:stream";

describe("LineSplitter", () => {
  it("should emit only complete lines and keep the remainder pending", () => {
    const splitter = new LineSplitter();

    assert.deepEqual(splitter.push(Buffer.from("first\nsec")), ["first"]);
    assert.deepEqual(splitter.push(Buffer.from("ond\nthird")), ["second"]);
    assert.deepEqual(splitter.flush(), ["third"]);
  });

  it("should strip carriage returns from CRLF endings", () => {
    const splitter = new LineSplitter();

    assert.deepEqual(splitter.push(Buffer.from("a\r\nb\r\n")), ["a", "b"]);
    assert.deepEqual(splitter.flush(), []);
  });

  it("should keep empty lines", () => {
    const splitter = new LineSplitter();

    assert.deepEqual(splitter.push(Buffer.from("a\n\nb\n")), ["a", "", "b"]);
  });

  it("should reassemble a multi-byte character split across chunks", () => {
    const splitter = new LineSplitter();
    const bytes = Buffer.from("café\n", "utf-8");

    assert.deepEqual(splitter.push(bytes.subarray(0, 4)), []);
    assert.deepEqual(splitter.push(bytes.subarray(4)), ["café"]);
  });

  it("should replace invalid UTF-8 with the replacement character", () => {
    const splitter = new LineSplitter();

    assert.deepEqual(splitter.push(Buffer.from([0x61, 0xff, 0x62, 0x0a])), ["a�b"]);
  });

  it("should return nothing on flush when no data is pending", () => {
    assert.deepEqual(new LineSplitter().flush(), []);
  });
});

describe("createBufferSink", () => {
  it("should record lines with their stream in arrival order", () => {
    const sink = createBufferSink();
    sink.writeLine("stdout", "one");
    sink.writeLine("stderr", "two");
    sink.writeLine("stdout", "three");

    assert.deepEqual(sink.lines, [
      { stream: "stdout", line: "one" },
      { stream: "stderr", line: "two" },
      { stream: "stdout", line: "three" },
    ]);
    assert.equal(sink.text(), "one\ntwo\nthree");
    assert.equal(sink.text("stdout"), "one\nthree");
  });
});

describe("createTeeSink", () => {
  it("should forward every line to each sink", () => {
    const first = createBufferSink();
    const second = createBufferSink();
    const tee = createTeeSink(first, second);

    tee.writeLine("stderr", "warning");

    assert.deepEqual(first.lines, [{ stream: "stderr", line: "warning" }]);
    assert.deepEqual(second.lines, [{ stream: "stderr", line: "warning" }]);
  });
});

describe("createWritableSink", () => {
  it("should write newline-terminated lines with the prefix", () => {
    const target = new PassThrough();
    const sink = createWritableSink(target, "[dbt] ");

    sink.writeLine("stdout", "Running with dbt");
    sink.writeLine("stderr", "Done");

    assert.equal(target.read()?.toString("utf-8"), "[dbt] Running with dbt\n[dbt] Done\n");
  });
});
