/** Inbound chat command source for one configured bot. */
export interface CommandListener {
  readonly botName: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}
