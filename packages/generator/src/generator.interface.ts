export interface IAnswerGenerator {
  readonly name: string;
  /** Returns the model's answer verbatim. */
  generate(prompt: string): Promise<string>;
}
