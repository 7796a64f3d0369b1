export interface ITextGenerator {
  readonly model: string;
  generate(system: string, user: string): Promise<string>;
}
