export const AI_PROVIDER = Symbol('AI_PROVIDER');

export interface AIProvider {
  /**
   * Genera una respuesta a la pregunta usando únicamente el contexto recuperado.
   */
  answer(question: string, context: string, signal?: AbortSignal): Promise<string>;

  /**
   * Calcula un embedding por texto, en el mismo orden de entrada.
   */
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export const NO_ANSWER_TEXT =
  'I cannot find the answer in the provided documents.';
