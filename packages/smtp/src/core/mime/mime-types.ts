const byExtension: Readonly<Record<string, string>> = {
  txt: "text/plain",
  html: "text/html",
  htm: "text/html",
  csv: "text/csv",
  pdf: "application/pdf",
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  zip: "application/zip",
}

export const DEFAULT_CONTENT_TYPE = "application/octet-stream"

export function contentTypeFor(filename: string): string {
  const dot = filename.lastIndexOf(".")
  if (dot < 0) return DEFAULT_CONTENT_TYPE

  return byExtension[filename.slice(dot + 1).toLowerCase()] ?? DEFAULT_CONTENT_TYPE
}
