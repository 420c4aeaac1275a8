export type VersionInfo = {
  app: string;
  version: string;
  digest: 'sha256';
  runtime: string;
};

export function getAppInfo(
  app: string,
  version: string,
  runtime: string,
): VersionInfo {
  return { app, version, digest: 'sha256', runtime };
}
