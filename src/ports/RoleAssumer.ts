export type Credentials = {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  expiresAt: number; // epoch ms
};

export type AssumeRoleParams = {
  roleArn: string;
  sessionName: string;
  durationSeconds?: number;
};

export interface RoleAssumer {
  assumeRole(params: AssumeRoleParams): Promise<Credentials>;
}
