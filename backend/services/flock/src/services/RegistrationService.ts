// backend/services/flock/src/services/RegistrationService.ts
/**
 * Purpose:
 * - Enroll a new agent principal and hand back its auth token.
 *
 * Invariants:
 * - Usernames are unique and immutable; a duplicate attempt never touches
 *   the stored token.
 * - Both outcomes raise a system notification (user_registered /
 *   user_already_exists). Delivery never changes the response.
 */

import { randomBytes } from "crypto";
import { ServiceBase } from "@flock/shared/base/ServiceBase";
import { withDeadline } from "@flock/shared/utils/withDeadline";
import {
  NAME_STRIP_PATTERN,
  RegisterRequestSchema,
  USERNAME_PATTERN,
} from "../contracts/register.contract";
import {
  DuplicateRegistrationError,
  UpstreamUnavailableError,
  ValidationError,
} from "../errors";
import type { NotificationConfigStore } from "../notify/NotificationConfigStore";
import type { NotificationDispatcher } from "../notify/NotificationDispatcher";
import type {
  InsertOutcome,
  IPrincipalStore,
  PrincipalRecord,
} from "../repo/principal.store.types";

export type TokenFactory = () => string;

/** 16 random bytes as 32 lowercase hex characters. */
export const defaultTokenFactory: TokenFactory = () =>
  randomBytes(16).toString("hex");

export class RegistrationService extends ServiceBase {
  private readonly principals: IPrincipalStore;
  private readonly configStore: NotificationConfigStore;
  private readonly dispatcher: NotificationDispatcher;
  private readonly timeoutMs: number;
  private readonly newToken: TokenFactory;

  constructor(deps: {
    principals: IPrincipalStore;
    configStore: NotificationConfigStore;
    dispatcher: NotificationDispatcher;
    timeoutMs: number;
    tokenFactory?: TokenFactory;
  }) {
    super({ service: "flock" });
    this.principals = deps.principals;
    this.configStore = deps.configStore;
    this.dispatcher = deps.dispatcher;
    this.timeoutMs = deps.timeoutMs;
    this.newToken = deps.tokenFactory ?? defaultTokenFactory;
  }

  public async register(body: unknown): Promise<{ auth_token: string }> {
    const parsed = RegisterRequestSchema.safeParse(body);
    if (!parsed.success || Object.keys(parsed.data).length === 0) {
      throw new ValidationError("Invalid JSON object", undefined, "body");
    }

    const username = parsed.data.username;
    if (!username) {
      throw new ValidationError("You must provide a username", undefined, "username");
    }
    if (!USERNAME_PATTERN.test(username)) {
      throw new ValidationError(
        "Usernames must only contain letters, numbers, '-', or '_'",
        undefined,
        "username"
      );
    }
    const name = (parsed.data.name ?? "").replace(NAME_STRIP_PATTERN, "");

    const existing = await this.store(
      () => this.principals.findByUsername(username),
      "principal.lookup"
    );
    if (existing) return this.rejectDuplicate(username, name);

    const principal: PrincipalRecord = { username, name, token: this.newToken() };
    const outcome = await this.store<InsertOutcome>(
      () => this.principals.insert(principal),
      "principal.insert"
    );
    if (outcome === "duplicate") return this.rejectDuplicate(username, name);

    this.log.info({ username }, "principal registered");
    await this.notify("user_registered", username, name);
    return { auth_token: principal.token };
  }

  private async rejectDuplicate(username: string, name: string): Promise<never> {
    this.log.warn({ username }, "duplicate registration attempt");
    await this.notify("user_already_exists", username, name);
    throw new DuplicateRegistrationError(username);
  }

  private async notify(kind: string, username: string, name: string): Promise<void> {
    await this.dispatcher.dispatch(
      { kind, payload: { username, name } },
      this.configStore.snapshot()
    );
  }

  private async store<T>(op: () => Promise<T>, label: string): Promise<T> {
    try {
      return await withDeadline(op, this.timeoutMs, label);
    } catch (err) {
      this.log.error(
        { op: label, err: this.log.serializeError(err).message },
        "principal store unavailable"
      );
      throw new UpstreamUnavailableError("Registration failed", err);
    }
  }
}
