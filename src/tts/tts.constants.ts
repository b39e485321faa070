export const SPEECH_SYNTHESIZER_TOKEN = 'SPEECH_SYNTHESIZER';
