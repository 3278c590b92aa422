export const DEPLOYMENT_SINK = Symbol("DEPLOYMENT_SINK");

export type DeployResult = { ok: true; signature: string } | { ok: false; reason: string };

export interface DeploymentSink {
  deploy(tileId: number, amountSol: number): Promise<DeployResult>;
}
