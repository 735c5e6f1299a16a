import type { AssumeRoleParams, Credentials, RoleAssumer } from "../../ports/RoleAssumer";
import { logInfo } from "../../shared/logging/log";
import type { Clock } from "../../shared/time/clock";
import { systemClock } from "../../shared/time/clock";

export type CredentialBrokerOptions = {
  roleArn: string;
  sessionName: string;
  durationSeconds?: number;
  refreshMarginMs: number;
};

/**
 * Caches the cross-account credentials for the vendor bucket and refreshes them
 * before they expire. Refresh is single-flight: every caller arriving while an
 * assume-role call is in flight awaits that same call.
 */
export class CredentialBroker {
  private current?: Credentials;
  private inflight?: Promise<Credentials>;
  private refreshes = 0;

  constructor(
    private readonly assumer: RoleAssumer,
    private readonly options: CredentialBrokerOptions,
    private readonly clock: Clock = systemClock
  ) {}

  async getCredentials(): Promise<Credentials> {
    const cached = this.current;
    if (cached && this.isFresh(cached)) return cached;
    return this.refresh();
  }

  /**
   * Called after the store rejected `stale`. If another worker already replaced
   * it, the replacement is returned without a second assume-role call.
   */
  async refreshAfterAuthFailure(stale: Credentials): Promise<Credentials> {
    if (this.inflight) return this.inflight;
    const cached = this.current;
    if (cached && cached !== stale && this.isFresh(cached)) return cached;
    return this.refresh();
  }

  refresh(): Promise<Credentials> {
    if (this.inflight) return this.inflight;

    const params: AssumeRoleParams = {
      roleArn: this.options.roleArn,
      sessionName: this.options.sessionName,
      durationSeconds: this.options.durationSeconds
    };
    const pending = this.assumer
      .assumeRole(params)
      .then((credentials) => {
        this.current = credentials;
        this.refreshes += 1;
        logInfo("credentials.refreshed", {
          roleArn: this.options.roleArn,
          expiresAt: new Date(credentials.expiresAt).toISOString(),
          refreshes: this.refreshes
        });
        return credentials;
      })
      .finally(() => {
        this.inflight = undefined;
      });
    this.inflight = pending;
    return pending;
  }

  private isFresh(credentials: Credentials): boolean {
    return credentials.expiresAt - this.clock.now() > this.options.refreshMarginMs;
  }
}
