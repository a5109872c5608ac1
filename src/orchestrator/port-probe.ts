import net from "node:net";

/** Checks whether a host port can be bound by a new container. */
export interface PortProbe {
  isFree(port: number): Promise<boolean>;
}

/** Binds the port briefly. Only EADDRINUSE counts as taken; Docker binds privileged ports we cannot. */
export class NetPortProbe implements PortProbe {
  isFree(port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const server = net.createServer();
      server.unref();
      server.once("error", (err: NodeJS.ErrnoException) => {
        resolve(err.code !== "EADDRINUSE");
      });
      server.listen(port, () => {
        server.close(() => resolve(true));
      });
    });
  }
}
