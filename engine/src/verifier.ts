/**
 * apkman Engine — SHA-256 Verification
 *
 * Checks cached artifacts and downloaded expansion files against the
 * hash declared in their install request.
 */

import * as fs from "fs";
import * as crypto from "crypto";

export type VerificationResult =
  | { status: "match"; actual: string }
  | { status: "mismatch"; expected: string; actual: string }
  | { status: "missing" };

const SHA256_HEX = /^[a-f0-9]{64}$/;

/**
 * Streamed, so expansion files of several GB are never held in memory.
 */
export async function computeFileHash(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    const stream = fs.createReadStream(filePath);

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", (err) =>
      reject(new Error(`Failed to read ${filePath} for hashing: ${err.message}`)),
    );
  });
}

/**
 * Compare a file with an expected SHA-256 given in either case.
 * A missing file is a result, not an error; a malformed hash throws.
 */
export async function verifyChecksum(
  filePath: string,
  expectedHash: string,
): Promise<VerificationResult> {
  const expected = expectedHash.trim().toLowerCase();
  if (!SHA256_HEX.test(expected)) {
    throw new Error(`Not a SHA-256 hash: "${expectedHash}"`);
  }
  if (!fs.existsSync(filePath)) {
    return { status: "missing" };
  }

  const actual = await computeFileHash(filePath);
  return actual === expected
    ? { status: "match", actual }
    : { status: "mismatch", expected, actual };
}
