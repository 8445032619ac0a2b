import { decodeEventStream } from "../../../adapters/openai/event-stream-decoder";
import { UnboundedChannel } from "../../../shared/async/unbounded-channel";
import {
  FrameDecodeError,
  TransportError,
} from "../../../shared/errors/assist-errors";
import { StreamItem } from "../../../shared/types/chat";
import {
  collect,
  createFakeLogger,
  dataFrame,
  readableFrom,
  streamEvent,
} from "../../helpers/fakes";

async function decode(chunks: Array<string | Buffer>) {
  const channel = new UnboundedChannel<StreamItem>();
  const summary = await decodeEventStream(
    readableFrom(chunks),
    channel,
    createFakeLogger(),
  );
  return { summary, items: await collect(channel) };
}

function contents(items: StreamItem[]): Array<string | undefined> {
  return items.map((item) =>
    item.ok ? item.event.choices[0].delta.content : item.error.name,
  );
}

describe("decodeEventStream", () => {
  it("publishes good frames in order and reports a malformed one without stopping", async () => {
    const { items, summary } = await decode([
      dataFrame(streamEvent("Hello")),
      ":\n",
      "data: {malformed}\n",
      dataFrame(streamEvent(" world")),
    ]);

    expect(contents(items)).toEqual(["Hello", "FrameDecodeError", " world"]);
    const failure = items[1];
    expect(failure.ok).toBe(false);
    if (!failure.ok) {
      expect(failure.error).toBeInstanceOf(FrameDecodeError);
      expect(failure.error).toMatchObject({ line: "data: {malformed}" });
    }
    expect(summary).toEqual({
      lines: 4,
      events: 2,
      decodeFailures: 1,
      transportFailed: false,
    });
  });

  it("reassembles frames split across chunks", async () => {
    const frame = dataFrame(streamEvent("split"));

    const { items } = await decode([frame.slice(0, 9), frame.slice(9, 30), frame.slice(30)]);

    expect(contents(items)).toEqual(["split"]);
  });

  it("decodes multi-byte characters split across byte chunks", async () => {
    const bytes = Buffer.from(dataFrame(streamEvent("日本語")), "utf-8");
    const cut = bytes.indexOf(Buffer.from("本", "utf-8")) + 1;

    const { items } = await decode([bytes.subarray(0, cut), bytes.subarray(cut)]);

    expect(contents(items)).toEqual(["日本語"]);
  });

  it("accepts CRLF line endings", async () => {
    const frame = dataFrame(streamEvent("crlf")).replace("\n", "\r\n");

    const { items } = await decode([frame]);

    expect(contents(items)).toEqual(["crlf"]);
  });

  it("ignores lines without the exact data prefix", async () => {
    const payload = JSON.stringify(streamEvent("x"));

    const { items, summary } = await decode([
      "\n",
      ": keep-alive\n",
      "event: message\n",
      `data:${payload}\n`,
      `DATA: ${payload}\n`,
    ]);

    expect(items).toEqual([]);
    expect(summary.lines).toBe(5);
  });

  it("skips the [DONE] marker without reporting a failure", async () => {
    const { items, summary } = await decode([
      dataFrame(streamEvent("last")),
      "data: [DONE]\n",
      "\n",
    ]);

    expect(contents(items)).toEqual(["last"]);
    expect(summary.decodeFailures).toBe(0);
  });

  it("keeps reading after [DONE] until the body ends", async () => {
    const { items } = await decode([
      "data: [DONE]\n",
      dataFrame(streamEvent("late")),
    ]);

    expect(contents(items)).toEqual(["late"]);
  });

  it("drops a partial trailing line at end of input", async () => {
    const unterminated = dataFrame(streamEvent("partial")).trimEnd();

    const { items } = await decode([dataFrame(streamEvent("full")), unterminated]);

    expect(contents(items)).toEqual(["full"]);
  });

  it("reports a read failure as a transport error and closes the channel", async () => {
    async function* failingBody(): AsyncGenerator<string> {
      yield dataFrame(streamEvent("before"));
      throw Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    }
    const channel = new UnboundedChannel<StreamItem>();

    const summary = await decodeEventStream(failingBody(), channel, createFakeLogger());
    const items = await collect(channel);

    expect(summary.transportFailed).toBe(true);
    expect(channel.send({ ok: true, event: streamEvent("late") })).toBe(false);
    expect(items).toHaveLength(2);
    const last = items[1];
    expect(last.ok).toBe(false);
    if (!last.ok) {
      expect(last.error).toBeInstanceOf(TransportError);
      expect(last.error).toMatchObject({
        code: "ECONNRESET",
        message: "レスポンスの読み取り中に接続エラーが発生しました: socket hang up",
      });
    }
  });

  it("closes the channel on a normal end of input", async () => {
    const channel = new UnboundedChannel<StreamItem>();

    await decodeEventStream(readableFrom([]), channel, createFakeLogger());

    expect(channel.send({ ok: true, event: streamEvent("late") })).toBe(false);
  });
});
