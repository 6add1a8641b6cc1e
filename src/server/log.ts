export function log(...args: unknown[]) {
  console.log("[server]", ...args);
}

export function warn(...args: unknown[]) {
  console.warn("[server]", ...args);
}
