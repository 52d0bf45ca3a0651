import { DEFAULT_API_HOST, REQUEST_TIMEOUT_MS } from "../shared/constants.js";
import { ApiError, errorMessage } from "../shared/errors.js";
import { getLogger } from "../shared/logging.js";
import { assertSchema } from "../protocols/assert.js";
import { ApiEnvelopeSchema, StartDataSchema, type ApiEnvelope } from "./schemas.js";
import { freshSigningInput, signRequest, type SigningInput } from "./signing.js";

export interface ApiCredentials {
  accessKey: string;
  accessSecret: string;
  appId: number;
  /** Base URL of the REST API; defaults to the production host. */
  host?: string;
}

export interface AnchorInfo {
  roomId?: number;
  name?: string;
  openId?: string;
}

export interface StartResult {
  /** Server-issued id for this start…end lifecycle (the upstream calls it game_id). */
  sessionId: string;
  socketUrls: string[];
  authBody: string;
  anchor: AnchorInfo;
}

/** REST lifecycle of one push session. */
export interface LiveApi {
  start(identityCode: string): Promise<StartResult>;
  /** Resolves on a non-zero response code; rejects only on transport or HTTP failure. */
  heartbeat(sessionId: string): Promise<void>;
  /** Same contract as `heartbeat`. */
  end(sessionId: string): Promise<void>;
}

export interface OpenLiveClientOptions {
  fetch?: typeof fetch;
  timeoutMs?: number;
  /** Supplies nonce and timestamp per request. */
  signingInput?: () => SigningInput;
}

export class OpenLiveClient implements LiveApi {
  private readonly logger = getLogger().child({ module: "live.api" });
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly signingInput: () => SigningInput;

  constructor(
    private readonly credentials: ApiCredentials,
    options: OpenLiveClientOptions = {}
  ) {
    this.baseUrl = (credentials.host ?? DEFAULT_API_HOST).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.signingInput = options.signingInput ?? (() => freshSigningInput());
  }

  async start(identityCode: string): Promise<StartResult> {
    const envelope = await this.post("/v2/app/start", "start", {
      code: identityCode,
      app_id: this.credentials.appId,
    });
    const code = envelope.code ?? 0;
    if (code !== 0) {
      throw new ApiError(`start returned error ${code}: ${envelope.message ?? ""}`.trimEnd(), {
        apiCode: code,
      });
    }
    const data = assertSchema(
      StartDataSchema,
      envelope.data,
      (summary) => new ApiError(`Invalid start response: ${summary}`)
    );
    return {
      sessionId: data.game_info.game_id,
      socketUrls: data.websocket_info.wss_link,
      authBody: data.websocket_info.auth_body,
      anchor: {
        roomId: data.anchor_info.room_id,
        name: data.anchor_info.uname,
        openId: data.anchor_info.open_id,
      },
    };
  }

  async heartbeat(sessionId: string): Promise<void> {
    const envelope = await this.post("/v2/app/heartbeat", "heartbeat", { game_id: sessionId });
    this.warnOnFailure("heartbeat", sessionId, envelope);
  }

  async end(sessionId: string): Promise<void> {
    const envelope = await this.post("/v2/app/end", "end", {
      app_id: this.credentials.appId,
      game_id: sessionId,
    });
    this.warnOnFailure("end", sessionId, envelope);
  }

  private warnOnFailure(label: string, sessionId: string, envelope: ApiEnvelope): void {
    const code = envelope.code ?? 0;
    if (code !== 0) {
      this.logger.warn({ sessionId, code, message: envelope.message ?? "" }, `${label} returned a non-zero code`);
    }
  }

  private async post(path: string, label: string, payload: Record<string, unknown>): Promise<ApiEnvelope> {
    // The exact bytes that are hashed are the bytes that are sent.
    const body = JSON.stringify(payload);
    const headers = signRequest(body, this.credentials, this.signingInput());

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: "POST",
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ApiError(`${label} request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw new ApiError(`${label} returned HTTP ${response.status}`, { status: response.status });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new ApiError(`${label} returned a body that is not JSON`, {
        status: response.status,
        cause: err,
      });
    }
    const status = response.status;
    this.logger.debug({ path, status }, `${label} completed`);
    return assertSchema(
      ApiEnvelopeSchema,
      json,
      (summary) => new ApiError(`Invalid ${label} response: ${summary}`, { status })
    );
  }
}
