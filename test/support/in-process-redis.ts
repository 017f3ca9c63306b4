/** The slice of Redis the service uses, held in a Map. No expiry. */
export class InProcessRedis {
  private readonly values = new Map<string, string>();

  async incr(key: string): Promise<number> {
    const next = Number(this.values.get(key) ?? '0') + 1;
    this.values.set(key, String(next));
    return next;
  }

  async expire(_key: string, _seconds: number): Promise<number> {
    return 1;
  }

  async ping(): Promise<string> {
    return 'PONG';
  }

  async set(
    key: string,
    value: string,
    _secondsToken: 'EX',
    _seconds: number,
    _nx: 'NX',
  ): Promise<'OK' | null> {
    if (this.values.has(key)) {
      return null;
    }
    this.values.set(key, value);
    return 'OK';
  }
}
