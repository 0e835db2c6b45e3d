export interface SessionIdGenerator {
  generate(): string;
}
