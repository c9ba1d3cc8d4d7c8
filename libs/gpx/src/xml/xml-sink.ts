export interface XmlSink {
  write(chunk: string): void;
}

export class StringSink implements XmlSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}
