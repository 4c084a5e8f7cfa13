function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function log(message: string, source = "ledger") {
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function warn(message: string, source = "ledger") {
  console.warn(`${timestamp()} [${source}] ${message}`);
}
