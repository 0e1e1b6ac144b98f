import type { ZodError } from "zod";

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

// Flattens zod issues into "path: message; path: message"
export function formatIssues(error: ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

export function truncateLogLine(line: string, max = 80): string {
  if (line.length <= max) {
    return line;
  }
  return line.slice(0, max - 1) + "…";
}
