import { describe, expect, it } from "vitest";
import { EventFramer } from "./framing.js";

describe("EventFramer", () => {
  it("emits each data line as soon as it is complete", () => {
    const framer = new EventFramer();

    expect(framer.push('data: {"type":"progress"}\n')).toEqual([{ data: '{"type":"progress"}' }]);
    expect(framer.push("\n")).toEqual([]);
  });

  it("buffers partial lines across chunks", () => {
    const framer = new EventFramer();

    expect(framer.push("data: {\"type\":")).toEqual([]);
    expect(framer.push('"done"}\r\n\r\n')).toEqual([{ data: '{"type":"done"}' }]);
  });

  it("decodes multi-byte characters split between chunks", () => {
    const framer = new EventFramer();
    const bytes = new TextEncoder().encode('data: {"message":"🔄"}\n');
    // cut inside the four-byte emoji
    const cut = bytes.length - 5;

    expect(framer.push(bytes.slice(0, cut))).toEqual([]);
    expect(framer.push(bytes.slice(cut))).toEqual([{ data: '{"message":"🔄"}' }]);
  });

  it("ignores comments, ids and retry hints", () => {
    const framer = new EventFramer();

    const events = framer.push(": keep-alive\nid: 7\nretry: 1000\ndata: {}\n\n");

    expect(events).toEqual([{ data: "{}" }]);
  });

  it("passes lines that are neither SSE nor JSON through unchanged", () => {
    const framer = new EventFramer();

    const events = framer.push("Internal Server Error\ndata: {}\n");

    expect(events).toEqual([{ data: "Internal Server Error" }, { data: "{}" }]);
  });

  it("attaches the event name until the next blank line", () => {
    const framer = new EventFramer();

    const events = framer.push("event: progress\ndata: {\"message\":\"a\"}\n\ndata: {}\n");

    expect(events).toEqual([{ event: "progress", data: '{"message":"a"}' }, { data: "{}" }]);
  });

  it("passes bare JSON lines through", () => {
    const framer = new EventFramer();

    const events = framer.push('  {"type":"answer","text":"hi"}\n{"type":"done"}\n');

    expect(events).toEqual([{ data: '{"type":"answer","text":"hi"}' }, { data: '{"type":"done"}' }]);
  });

  it("flushes a final line without a trailing newline", () => {
    const framer = new EventFramer();

    expect(framer.push('data: {"type":"done"}')).toEqual([]);
    expect(framer.flush()).toEqual([{ data: '{"type":"done"}' }]);
    expect(framer.flush()).toEqual([]);
  });
});
