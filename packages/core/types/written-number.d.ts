declare module 'written-number' {
  interface WrittenNumberOptions {
    lang?: string;
    noAnd?: boolean;
    alternativeBase?: string;
  }

  function writtenNumber(value: number, options?: WrittenNumberOptions): string;

  export = writtenNumber;
}
