/**
 * Output extraction for job results. Upstream models disagree on output
 * shape; unrecognized shapes yield empty results instead of errors.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Text from a job output: a string, a list (concatenated in order), or an
 * object with a `text` or `output` field.
 */
export function extractOutputText(output: unknown): string {
  if (typeof output === "string") return output;
  if (Array.isArray(output)) {
    return output.map((item) => extractOutputText(item)).join("");
  }
  if (isRecord(output)) {
    const text = output["text"];
    if (typeof text === "string") return text;
    if ("output" in output) return extractOutputText(output["output"]);
  }
  return "";
}

const URL_PATTERN = /^(https?:\/\/|data:)/;

/** Media URLs from a job output, in encounter order. */
export function extractOutputUrls(output: unknown): string[] {
  if (typeof output === "string") {
    return URL_PATTERN.test(output) ? [output] : [];
  }
  if (Array.isArray(output)) {
    return output.flatMap((item) => extractOutputUrls(item));
  }
  if (isRecord(output)) {
    for (const key of ["url", "video", "image", "output"]) {
      if (key in output) {
        const urls = extractOutputUrls(output[key]);
        if (urls.length > 0) return urls;
      }
    }
  }
  return [];
}

/** Rough token count: four characters per token. */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}
