import { ConfigurationError } from "../errors";
import { InformationSource, SourceLookup } from "./types";

export class SourceRegistry implements SourceLookup {
  private readonly sources = new Map<string, InformationSource>();

  constructor(sources: InformationSource[] = []) {
    sources.forEach((source) => this.register(source));
  }

  register(source: InformationSource): this {
    if (this.sources.has(source.name)) {
      throw new ConfigurationError(`Source ${source.name} is already registered`);
    }
    this.sources.set(source.name, source);
    return this;
  }

  get(name: string): InformationSource | undefined {
    return this.sources.get(name);
  }

  has(name: string): boolean {
    return this.sources.has(name);
  }

  names(): string[] {
    return Array.from(this.sources.keys());
  }

  list(): InformationSource[] {
    return Array.from(this.sources.values());
  }
}
