const MAX_FILENAME_LENGTH = 180;
const FALLBACK_FILENAME = "datasheet";
const QUERY_FILENAME_KEYS = ["filename", "file", "name", "download"] as const;

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** Reads a filename out of a Content-Disposition header, preferring the RFC 5987 form. */
export function filenameFromContentDisposition(header: string | null | undefined): string | undefined {
  if (!header) {
    return undefined;
  }

  const extended = /filename\*\s*=\s*([^']*)'[^']*'([^;]+)/i.exec(header);
  if (extended) {
    return safeDecode(extended[2].trim().replace(/^"|"$/g, ""));
  }

  const quoted = /filename\s*=\s*"([^"]*)"/i.exec(header);
  if (quoted && quoted[1].trim()) {
    return quoted[1].trim();
  }

  const bare = /filename\s*=\s*([^;]+)/i.exec(header);
  if (bare && bare[1].trim()) {
    return bare[1].trim();
  }
  return undefined;
}

export function filenameFromUrl(rawUrl: string): string | undefined {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return undefined;
  }

  for (const key of QUERY_FILENAME_KEYS) {
    const value = url.searchParams.get(key);
    if (value && value.trim()) {
      return value.trim();
    }
  }

  const segments = url.pathname.split("/").filter((segment) => segment.length > 0);
  const last = segments[segments.length - 1];
  return last ? safeDecode(last) : undefined;
}

export function sanitizeFilename(name: string, contentType?: string | null): string {
  const base = name.split(/[\\/]/).pop() ?? "";
  let cleaned = base
    .replace(/[\u0000-\u001f\u007f]/g, "")
    .replace(/^\.+/, "")
    .trim();

  if (!cleaned) {
    cleaned = FALLBACK_FILENAME;
  }

  const isPdf = (contentType ?? "").toLowerCase().includes("pdf");
  const suffix = isPdf && !/\.pdf$/i.test(cleaned) ? ".pdf" : "";
  const room = MAX_FILENAME_LENGTH - suffix.length;
  return `${cleaned.slice(0, room)}${suffix}`;
}

/** Picks the stored display name for a downloaded file. */
export function guessFilename(
  url: string,
  contentDisposition: string | null | undefined,
  contentType: string | null | undefined,
): string {
  const candidate = filenameFromContentDisposition(contentDisposition) ?? filenameFromUrl(url) ?? FALLBACK_FILENAME;
  return sanitizeFilename(candidate, contentType);
}
