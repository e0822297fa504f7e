/**
 * Asset Server - loopback HTTP server for a web device session
 *
 * Serves three kinds of GET request for the current BundleContext:
 *   /               -> <webSourcePath>/index.html (text/html)
 *   /main.dart.js   -> <compiledOutputPath>/main.dart.js (text/javascript)
 *   anything else   -> <assetBundlePath>/<path without "/assets/">
 * Every other method gets 403, every missing file 404.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { Server } from "node:http";
import type { Socket } from "node:net";
import { isAbsolute, join, relative, resolve, sep } from "node:path";
import { pipeline } from "node:stream/promises";
import { BindError } from "./errors.js";
import { consoleLogger, nodeFileSystem } from "./host.js";
import type { BundleContext, FileSystem, Logger } from "./types.js";

export const MAIN_SCRIPT = "main.dart.js";
const ASSETS_PREFIX = "/assets/";
const LOOPBACK_HOST = "127.0.0.1";

export interface AssetServerOptions {
  host?: string;
  fs?: FileSystem;
  logger?: Logger;
}

export interface ServerAddress {
  address: string;
  port: number;
  url: string;
}

interface ResolvedAsset {
  file: string;
  contentType?: string;
}

/**
 * Join `relativePath` onto `root`, or null when the result is `root` itself
 * or lies outside it
 */
function resolveWithin(root: string, relativePath: string): string | null {
  const base = resolve(root);
  const file = resolve(base, relativePath);
  const fromRoot = relative(base, file);

  if (fromRoot === "" || fromRoot === ".." || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
    return null;
  }
  return file;
}

/**
 * Map a decoded request path to a file for the given session
 */
export function resolveAsset(context: BundleContext, pathname: string): ResolvedAsset | null {
  // fs rejects paths with NUL bytes outright
  if (pathname.includes("\0")) {
    return null;
  }
  if (pathname === "/") {
    return { file: join(context.webSourcePath, "index.html"), contentType: "text/html" };
  }
  if (pathname === `/${MAIN_SCRIPT}`) {
    return { file: join(context.compiledOutputPath, MAIN_SCRIPT), contentType: "text/javascript" };
  }

  const relativePath = pathname.startsWith(ASSETS_PREFIX)
    ? pathname.slice(ASSETS_PREFIX.length)
    : pathname.replace(/^\/+/, "");
  const file = resolveWithin(context.assetBundlePath, relativePath);
  return file ? { file } : null;
}

export class AssetServer {
  private readonly host: string;
  private readonly fs: FileSystem;
  private readonly logger: Logger;
  private readonly app: Express;

  private context: BundleContext | null = null;
  private server: Server | null = null;
  private boundAddress: ServerAddress | null = null;
  // Track connections so shutdown does not wait on keep-alive sockets
  private readonly connections = new Set<Socket>();
  private lifecycle: Promise<void> = Promise.resolve();

  constructor(options: AssetServerOptions = {}) {
    this.host = options.host ?? LOOPBACK_HOST;
    this.fs = options.fs ?? nodeFileSystem;
    this.logger = options.logger ?? consoleLogger;
    this.app = this.createApp();
  }

  get address(): ServerAddress | null {
    return this.boundAddress;
  }

  get isListening(): boolean {
    return this.server !== null;
  }

  /**
   * Set the session to serve. Requests with no session get 404.
   */
  setContext(context: BundleContext | null): void {
    this.context = context;
  }

  /**
   * Listen on an OS-assigned loopback port. A previous listener is closed first.
   */
  bind(): Promise<ServerAddress> {
    return this.enqueue(async () => {
      await this.closeServer();
      return this.listen();
    });
  }

  /**
   * Close the listener and drop open connections. In-flight responses are
   * cut off. Safe to call when not listening.
   */
  shutdown(): Promise<void> {
    return this.enqueue(() => this.closeServer());
  }

  // bind and shutdown run one at a time so only one listener ever exists
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.lifecycle.then(task);
    this.lifecycle = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async listen(): Promise<ServerAddress> {
    const server = await new Promise<Server>((resolvePromise, reject) => {
      const listener = this.app.listen(0, this.host);
      const onError = (err: Error) => reject(new BindError(this.host, err));
      listener.once("error", onError);
      listener.once("listening", () => {
        listener.off("error", onError);
        resolvePromise(listener);
      });
    });

    server.on("error", (err) => {
      this.logger.error(`Asset server error on ${this.host}:`, err);
    });
    server.on("connection", (socket: Socket) => {
      this.connections.add(socket);
      socket.on("close", () => this.connections.delete(socket));
    });

    const info = server.address();
    if (info === null || typeof info === "string") {
      server.close();
      throw new BindError(this.host, new Error(`unexpected listener address ${String(info)}`));
    }

    const { port } = info;
    this.server = server;
    this.boundAddress = {
      address: this.host,
      port,
      url: `http://${this.host}:${port}`,
    };
    return this.boundAddress;
  }

  private async closeServer(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = null;
    this.boundAddress = null;

    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    await new Promise<void>((resolvePromise, reject) => {
      server.close((err) => (err ? reject(err) : resolvePromise()));
    });
  }

  private createApp(): Express {
    const app = express();
    app.disable("x-powered-by");
    app.disable("etag");

    app.use((req: Request, res: Response, next: NextFunction) => {
      if (req.method !== "GET") {
        res.status(403).end();
        return;
      }
      next();
    });

    app.use((req: Request, res: Response, next: NextFunction) => {
      this.serveAsset(req, res).catch(next);
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      this.logger.error(`Failed to serve ${req.path}:`, err);
      if (res.headersSent) {
        res.destroy();
        return;
      }
      res.status(500).end();
    });

    return app;
  }

  private async serveAsset(req: Request, res: Response): Promise<void> {
    const context = this.context;
    if (!context) {
      res.status(404).end();
      return;
    }

    let pathname: string;
    try {
      pathname = decodeURIComponent(req.path);
    } catch {
      res.status(404).end();
      return;
    }

    const asset = resolveAsset(context, pathname);
    if (!asset || !this.fs.isFile(asset.file)) {
      res.status(404).end();
      return;
    }

    res.status(200);
    if (asset.contentType) {
      res.setHeader("Content-Type", asset.contentType);
    }
    await pipeline(this.fs.createReadStream(asset.file), res);
  }
}
