// castv2-client ships no type declarations; this covers the parts used by cast-client.ts.
declare module "castv2-client" {
  import { EventEmitter } from "events";

  namespace castv2 {
    type Callback<T> = (error: Error | null, result: T) => void;

    interface ApplicationSession {
      appId: string;
      displayName?: string;
      sessionId: string;
      isIdleScreen?: boolean;
      namespaces?: Array<{ name: string }>;
    }

    interface MediaInformation {
      contentId: string;
      contentType: string;
      streamType: "BUFFERED" | "LIVE" | "NONE";
      metadata?: { type: number; metadataType: number; title?: string };
    }

    interface MediaStatus {
      playerState?: "IDLE" | "PLAYING" | "PAUSED" | "BUFFERING";
    }

    interface ApplicationClass<T extends Application> {
      APP_ID: string;
      new (client: unknown, session: ApplicationSession): T;
    }

    class ReceiverController extends EventEmitter {
      launch(appId: string, callback: Callback<ApplicationSession[]>): void;
      stop(sessionId: string, callback: Callback<ApplicationSession[]>): void;
    }

    class Controller extends EventEmitter {
      constructor(client: unknown, sourceId: string, destinationId: string, namespace: string, encoding?: string);
      close(): void;
    }

    class Application extends EventEmitter {
      static APP_ID: string;
      constructor(client: unknown, session: ApplicationSession);
      createController<A extends unknown[], T>(
        controller: new (client: unknown, sourceId: string, destinationId: string, ...args: A) => T,
        ...args: A
      ): T;
      close(): void;
    }

    class DefaultMediaReceiver extends Application {
      load(
        media: MediaInformation,
        options: { autoplay?: boolean; currentTime?: number },
        callback: Callback<MediaStatus>,
      ): void;
      stop(callback: Callback<MediaStatus>): void;
    }

    class Client extends EventEmitter {
      receiver: ReceiverController;
      connect(options: string | { host: string; port?: number }, callback: () => void): void;
      getSessions(callback: Callback<ApplicationSession[]>): void;
      launch<T extends Application>(application: ApplicationClass<T>, callback: Callback<T>): void;
      join<T extends Application>(
        session: ApplicationSession,
        application: ApplicationClass<T>,
        callback: Callback<T>,
      ): void;
      close(): void;
    }
  }

  export = castv2;
}
