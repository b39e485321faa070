import { TextGenerationOptions, TextGenerationRequest } from './llm.types';

export interface TextGenerator {
  generate(request: TextGenerationRequest, options?: TextGenerationOptions): Promise<string>;
}
