import type { Transport, SendOptions } from "@/transport/createHttpTransport";
import type { RequestParams } from "@/transport/serializeParams";

export interface RecordedCall {
  method: string;
  params: RequestParams;
  options: SendOptions;
}

type QueuedReply = string | Error;

/**
 * In-memory transport: records every call and answers from a queue
 */
export class FakeTransport implements Transport {
  readonly calls: RecordedCall[] = [];
  private readonly replies: QueuedReply[] = [];

  /** Queue a successful envelope around `result` */
  replyOk(result: unknown): this {
    this.replies.push(JSON.stringify({ ok: true, result }));
    return this;
  }

  replyError(error: string): this {
    this.replies.push(JSON.stringify({ ok: false, error }));
    return this;
  }

  replyRaw(body: string): this {
    this.replies.push(body);
    return this;
  }

  fail(error: Error): this {
    this.replies.push(error);
    return this;
  }

  async send(method: string, params: RequestParams = {}, options: SendOptions = {}): Promise<string> {
    this.calls.push({ method, params, options });
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error(`No reply queued for ${method}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
