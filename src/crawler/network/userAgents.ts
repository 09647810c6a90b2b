export const DEFAULT_USER_AGENTS: readonly string[] = [
  'link-chain-crawler/0.1 (+https://example.invalid/crawler)',
  'Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0 Safari/537.36',
];

/** Round-robin over the configured agents, one step per fetch. */
export class UserAgentRotation {
  private cursor = 0;
  private readonly agents: readonly string[];

  constructor(agents: readonly string[]) {
    this.agents = agents.length > 0 ? [...agents] : DEFAULT_USER_AGENTS;
  }

  next(): string {
    const agent = this.agents[this.cursor % this.agents.length];
    this.cursor += 1;
    return agent;
  }
}
