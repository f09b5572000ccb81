interface ReceivedIdentity {
  authId: string | null;
  authRoles: string | null;
  path: string;
}

class IdentityRecorder {
  private received: ReceivedIdentity[] = [];

  record(identity: ReceivedIdentity): void {
    this.received.push(identity);
  }

  count(): number {
    return this.received.length;
  }

  last(): ReceivedIdentity | null {
    return this.received[this.received.length - 1] ?? null;
  }

  reset(): void {
    this.received = [];
  }
}

export type { ReceivedIdentity };
export const identityRecorder = new IdentityRecorder();
