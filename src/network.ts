import { createSocket } from "dgram";

/**
 * Local address of the interface that routes toward `host`. Connecting a UDP socket
 * sends nothing; it only makes the kernel pick the source address.
 */
export const resolveLocalAddress = (host: string, port: number): Promise<string> =>
  new Promise((resolve, reject) => {
    const socket = createSocket("udp4");
    socket.once("error", (error) => {
      socket.close();
      reject(error);
    });
    socket.connect(port, host, () => {
      const { address } = socket.address();
      socket.close();
      resolve(address);
    });
  });

// Coarse heuristic: same /24 means the receiver most likely fetches over the LAN.
export const isSameSubnet = (a: string, b: string): boolean => {
  const prefix = (address: string) => address.split(".").slice(0, 3).join(".");
  return a.split(".").length === 4 && b.split(".").length === 4 && prefix(a) === prefix(b);
};

export const buildStreamUrl = (localAddress: string, port: number): string => `http://${localAddress}:${port}/`;
