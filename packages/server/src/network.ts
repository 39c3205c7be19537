import os from "node:os";

type InterfaceMap = ReturnType<typeof os.networkInterfaces>;

// Non-internal IPv4 addresses, so phones on the same LAN know where to connect.
export function getLanAddresses(interfaces: InterfaceMap = os.networkInterfaces()): string[] {
  const addresses: string[] = [];
  for (const entries of Object.values(interfaces)) {
    for (const entry of entries ?? []) {
      if (entry.family === "IPv4" && !entry.internal) {
        addresses.push(entry.address);
      }
    }
  }
  return addresses;
}

export function describeUrls(host: string, port: number, lanAddresses: string[]): string[] {
  if (host !== "0.0.0.0" && host !== "::") {
    return [`http://${host}:${port}`];
  }
  return [`http://127.0.0.1:${port}`, ...lanAddresses.map((address) => `http://${address}:${port}`)];
}
