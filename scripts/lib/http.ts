export type HttpReply = {
  status: number;
  headers: Headers;
  bytes: Buffer;
};

export type HttpResult =
  | { ok: true; reply: HttpReply; attempts: number; waitMs: number }
  | { ok: false; error: string; attempts: number; waitMs: number };

export type HttpClientOptions = {
  userAgent: string;
  timeoutMs: number;
  /** 额外重试次数（不含首次请求） */
  retries: number;
  backoffMs: number;
};

export type HttpClient = Readonly<HttpClientOptions> & {
  get: (url: string, headers?: Record<string, string>) => Promise<HttpResult>;
};

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function attemptOnce(params: {
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
}): Promise<HttpReply> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), params.timeoutMs);
  try {
    const res = await fetch(params.url, {
      headers: params.headers,
      signal: controller.signal,
      redirect: "follow"
    });
    // body 也要在超时范围内读完
    const ab = await res.arrayBuffer();
    return { status: res.status, headers: res.headers, bytes: Buffer.from(ab) };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * 进程内共享的 HTTP 客户端：固定 UA、单次请求超时、有限次数的短退避重试。
 * 重试只针对传输错误与 408/429/5xx；其余状态码原样交给调用方判断。
 */
export function createHttpClient(options: HttpClientOptions): HttpClient {
  const retries = Math.max(0, Math.floor(options.retries));
  const backoffMs = Math.max(0, options.backoffMs);

  const get = async (url: string, headers: Record<string, string> = {}): Promise<HttpResult> => {
    const merged = { "user-agent": options.userAgent, ...headers };
    let attempts = 0;
    let waitMs = 0;
    let lastError = "";

    while (attempts <= retries) {
      if (attempts > 0) {
        const delay = backoffMs * 2 ** (attempts - 1) + Math.floor(Math.random() * (backoffMs / 2));
        waitMs += delay;
        await sleep(delay);
      }
      attempts += 1;

      try {
        const reply = await attemptOnce({ url, headers: merged, timeoutMs: options.timeoutMs });
        if (isRetryableStatus(reply.status) && attempts <= retries) {
          lastError = `HTTP ${reply.status}`;
          continue;
        }
        return { ok: true, reply, attempts, waitMs };
      } catch (err) {
        lastError = err instanceof Error ? err.message : String(err);
      }
    }

    return { ok: false, error: lastError || "request_failed", attempts, waitMs };
  };

  return Object.freeze({ ...options, retries, backoffMs, get });
}
