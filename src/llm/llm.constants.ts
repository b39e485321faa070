export const TEXT_GENERATOR_TOKEN = 'TEXT_GENERATOR';
