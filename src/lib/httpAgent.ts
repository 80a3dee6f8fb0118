import { readFileSync } from "node:fs";
import https from "node:https";
import tls from "node:tls";

/**
 * System root certificates, plus the PEM bundle at `caBundlePath` when one
 * is configured (corporate proxies that re-sign TLS traffic).
 */
export function getCertificates(caBundlePath?: string): string[] {
  const systemCas = [...tls.rootCertificates];
  if (!caBundlePath) return systemCas;
  return [readFileSync(caBundlePath, "utf-8"), ...systemCas];
}

export function createHttpsAgent(caBundlePath?: string): https.Agent {
  return new https.Agent({
    ca: getCertificates(caBundlePath),
    rejectUnauthorized: true,
    keepAlive: true
  });
}
