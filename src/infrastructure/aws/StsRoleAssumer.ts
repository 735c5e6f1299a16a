import { AssumeRoleCommand, STSClient, type AssumeRoleCommandInput, type AssumeRoleCommandOutput } from "@aws-sdk/client-sts";
import { ConfigError } from "../../core/errors/syncErrors";
import type { AssumeRoleParams, Credentials, RoleAssumer } from "../../ports/RoleAssumer";

export type AssumeRoleOperation = (input: AssumeRoleCommandInput) => Promise<AssumeRoleCommandOutput>;

export const stsAssumeRole = (client: STSClient): AssumeRoleOperation => (input) =>
  client.send(new AssumeRoleCommand(input));

/** Cross-account access to the vendor bucket through STS AssumeRole. */
export class StsRoleAssumer implements RoleAssumer {
  constructor(private readonly assume: AssumeRoleOperation) {}

  async assumeRole(params: AssumeRoleParams): Promise<Credentials> {
    const out = await this.assume({
      RoleArn: params.roleArn,
      RoleSessionName: params.sessionName,
      DurationSeconds: params.durationSeconds
    });

    const creds = out.Credentials;
    if (!creds?.AccessKeyId || !creds.SecretAccessKey || !creds.SessionToken || !creds.Expiration) {
      throw new ConfigError(`AssumeRole for ${params.roleArn} returned no usable credentials`);
    }
    return {
      accessKeyId: creds.AccessKeyId,
      secretAccessKey: creds.SecretAccessKey,
      sessionToken: creds.SessionToken,
      expiresAt: creds.Expiration.getTime()
    };
  }
}

export const createStsRoleAssumer = (region: string): StsRoleAssumer =>
  new StsRoleAssumer(stsAssumeRole(new STSClient({ region })));
