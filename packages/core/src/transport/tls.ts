import { readFile, stat } from "node:fs/promises";
import { X509Certificate } from "node:crypto";
import { extname, resolve } from "node:path";
import { ConfigError, TlsError } from "../errors/catalog.js";

const CERTIFICATE_EXTENSIONS = new Set([".pem", ".crt", ".der"]);
const PEM_HEADER = "-----BEGIN";

/**
 * Checks that a certificate path exists, is a regular file and has a
 * .pem, .crt or .der extension. Returns the absolute path.
 */
export async function verifyCertificatePath(path: string): Promise<string> {
  const absolute = resolve(path);

  let isFile: boolean;
  try {
    isFile = (await stat(absolute)).isFile();
  } catch {
    throw new ConfigError("Certificate filepath does not exist", { path: absolute });
  }
  if (!isFile) {
    throw new ConfigError("Certificate filepath is not a file", { path: absolute });
  }

  if (!CERTIFICATE_EXTENSIONS.has(extname(absolute).toLowerCase())) {
    throw new ConfigError("Invalid certificate file extension", { path: absolute });
  }
  return absolute;
}

function derToPem(data: Buffer, path: string): string {
  try {
    return new X509Certificate(data).toString();
  } catch (err) {
    throw new TlsError(`Failed to parse DER certificate: ${path}`, { cause: err });
  }
}

/**
 * Loads a certificate for use as an extra trusted CA, returned as PEM text.
 * .crt files may hold either encoding, so their content decides.
 */
export async function loadCertificate(path: string): Promise<string> {
  const absolute = await verifyCertificatePath(path);
  const data = await readFile(absolute);
  const looksPem = data.subarray(0, PEM_HEADER.length).toString("ascii") === PEM_HEADER;

  switch (extname(absolute).toLowerCase()) {
    case ".pem":
      if (!looksPem) {
        throw new TlsError(`No PEM certificate found in ${absolute}`);
      }
      return data.toString("utf-8");
    case ".der":
      return derToPem(data, absolute);
    default:
      return looksPem ? data.toString("utf-8") : derToPem(data, absolute);
  }
}
