import { ChildProcess, spawn } from 'child_process';
import { ILogger } from '../../domain/common/ILogger';
import { ISpeechService } from '../../domain/services/ISpeechService';
import { SpeechMode } from '../../types';

/**
 * Speaks through an external text-to-speech command such as `espeak` or
 * `say`. The text is passed as the last argument.
 */
export class CommandSpeechService implements ISpeechService {
  private readonly logger: ILogger;
  private current: ChildProcess | null = null;

  constructor(private readonly command: string | null, logger: ILogger) {
    this.logger = logger.child({ component: 'speech' });
  }

  async isAvailable(): Promise<boolean> {
    return this.command !== null && this.command.trim() !== '';
  }

  speak(text: string, mode: SpeechMode): Promise<void> {
    const [program, ...args] = (this.command ?? '').trim().split(/\s+/);
    if (!program) {
      return Promise.reject(new Error('No speech command configured'));
    }

    return new Promise((resolve, reject) => {
      const child = spawn(program, [...args, text], { stdio: 'ignore' });
      this.current = child;

      child.once('spawn', () => {
        this.logger.debug('Speaking', { mode, length: text.length });
        resolve();
      });
      child.once('error', (err) => {
        if (this.current === child) this.current = null;
        reject(err);
      });
      child.once('exit', (code) => {
        if (this.current === child) this.current = null;
        if (code !== 0) {
          this.logger.warn('Speech command exited with an error', { code });
        }
      });
    });
  }

  isSpeaking(): boolean {
    return this.current !== null;
  }
}
