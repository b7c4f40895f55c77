/**
 * Process-level lifecycle flag read by the health route.
 */
export class ServerState {
  private shuttingDown = false;

  public markShuttingDown(): void {
    this.shuttingDown = true;
  }

  public get isShuttingDown(): boolean {
    return this.shuttingDown;
  }
}
