import { SpeechMode } from '../../types';

/**
 * Text-to-speech playback.
 */
export interface ISpeechService {
  isAvailable(): Promise<boolean>;

  /**
   * Start speaking and return; completion is observed through `isSpeaking`.
   */
  speak(text: string, mode: SpeechMode): Promise<void>;

  isSpeaking(): boolean;
}
