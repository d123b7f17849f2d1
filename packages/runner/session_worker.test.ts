import { describe, expect, it } from "vitest";

import { WorkerClosedError } from "./error.ts";
import { SessionWorker } from "./session_worker.ts";
import {
  collectMessages,
  FakeVendorClient,
  resultMessage,
  streamedText,
  textTurn,
} from "./test_helpers.ts";

function startWorker(
  client: FakeVendorClient,
  options: { stopTimeoutMs?: number; gracefulDisconnectTimeoutMs?: number } =
    {},
): SessionWorker {
  const worker = new SessionWorker("thread-1", () => client, options);
  worker.start();
  return worker;
}

describe("SessionWorker", () => {
  it("serves concurrent queries one turn at a time, in order", async () => {
    const client = new FakeVendorClient();
    const worker = startWorker(client);

    const results = await Promise.all(
      ["one", "two", "three"].map((prompt) =>
        collectMessages(worker.query(prompt, "thread-1"))
      ),
    );

    expect(results.map(streamedText)).toEqual(["one", "two", "three"]);
    expect(results.map((messages) => messages.at(-1))).toEqual([
      resultMessage("one"),
      resultMessage("two"),
      resultMessage("three"),
    ]);
    expect(client.prompts).toEqual([
      { prompt: "one", sessionId: "thread-1" },
      { prompt: "two", sessionId: "thread-1" },
      { prompt: "three", sessionId: "thread-1" },
    ]);
    expect(client.maxActiveQueries).toBe(1);
    expect(worker.status).toBe("serving");

    await worker.stop();
  });

  it("re-throws a turn's error after its messages and keeps serving", async () => {
    const client = new FakeVendorClient((prompt) =>
      prompt === "fail"
        ? { messages: [resultMessage("partial")], error: new Error("turn failed") }
        : textTurn(prompt)
    );
    const worker = startWorker(client);

    const received: string[] = [];
    const failing = (async () => {
      for await (const message of worker.query("fail")) {
        received.push(message.kind);
      }
    })();

    await expect(failing).rejects.toThrow("turn failed");
    expect(received).toEqual(["result"]);

    const next = await collectMessages(worker.query("again"));
    expect(streamedText(next)).toBe("again");

    await worker.stop();
  });

  it("captures the vendor session id from the init message", async () => {
    const client = new FakeVendorClient((prompt) => textTurn(prompt, "sess-42"));
    const worker = startWorker(client);
    expect(worker.sessionId).toBeUndefined();

    await collectMessages(worker.query("hello"));
    expect(worker.sessionId).toBe("sess-42");

    await worker.stop();
  });

  it("reports a connection failure through the first turn", async () => {
    const client = new FakeVendorClient();
    client.connectError = new Error("connect failed");
    const worker = startWorker(client);

    await expect(collectMessages(worker.query("hello"))).rejects.toThrow(
      "connect failed",
    );

    await worker.stop();
    expect(worker.status).toBe("disconnected");
    expect(client.calls).toEqual(["connect", "closeInput", "disconnect"]);
    await expect(collectMessages(worker.query("again"))).rejects
      .toBeInstanceOf(WorkerClosedError);
  });

  it("closes input before disconnecting on stop", async () => {
    const client = new FakeVendorClient();
    const worker = startWorker(client);
    await collectMessages(worker.query("hello"));

    await worker.stop();
    await worker.stop();

    expect(worker.status).toBe("disconnected");
    expect(client.calls).toEqual(["connect", "closeInput", "disconnect"]);
  });

  it("disconnects when closing input never completes", async () => {
    const client = new FakeVendorClient();
    client.closeInputHold = new Promise(() => {});
    const worker = startWorker(client, { gracefulDisconnectTimeoutMs: 30 });
    await collectMessages(worker.query("hello"));

    const started = Date.now();
    await worker.stop();

    expect(Date.now() - started).toBeLessThan(1000);
    expect(worker.status).toBe("disconnected");
    expect(client.calls).toEqual(["connect", "closeInput", "disconnect"]);
  });

  it("keeps serving many turns without piling up abort listeners", async () => {
    const warnings: Error[] = [];
    const onWarning = (warning: Error) => warnings.push(warning);
    process.on("warning", onWarning);
    try {
      const client = new FakeVendorClient();
      const worker = startWorker(client);

      for (let i = 0; i < 25; i++) {
        const messages = await collectMessages(worker.query(`turn ${i}`));
        expect(streamedText(messages)).toBe(`turn ${i}`);
      }
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(warnings.map((warning) => warning.name)).not.toContain(
        "MaxListenersExceededWarning",
      );
      await worker.stop();
    } finally {
      process.off("warning", onWarning);
    }
  });

  it("force-cancels a loop that does not stop in time", async () => {
    const client: FakeVendorClient = new FakeVendorClient(() => ({
      messages: [],
      hold: client.disconnected,
      error: new Error("connection closed"),
    }));
    const worker = startWorker(client, {
      stopTimeoutMs: 20,
      gracefulDisconnectTimeoutMs: 50,
    });

    const stuck = collectMessages(worker.query("never ends"));
    const outcome = stuck.then(() => "completed", (error: unknown) => error);
    await new Promise((resolve) => setTimeout(resolve, 5));

    await worker.stop();

    expect(worker.status).toBe("disconnected");
    expect(await outcome).toMatchObject({ message: "connection closed" });
    expect(client.calls[0]).toBe("connect");
    expect(client.calls).toContain("disconnect");
  });

  it("forwards interrupts to the connected client", async () => {
    const client = new FakeVendorClient();
    const worker = startWorker(client);
    await collectMessages(worker.query("hello"));

    await worker.interrupt();
    expect(client.calls).toContain("interrupt");

    client.interruptError = new Error("not running");
    await expect(worker.interrupt()).resolves.toBeUndefined();

    await worker.stop();
  });

  it("ignores interrupts before the client is connected", async () => {
    const client = new FakeVendorClient();
    const worker = new SessionWorker("thread-1", () => client);

    await expect(worker.interrupt()).resolves.toBeUndefined();
    expect(client.calls).toEqual([]);
    await worker.stop();
    expect(worker.status).toBe("disconnected");
  });
});
