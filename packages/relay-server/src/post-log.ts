import type { Logger } from './logger.js';
import type { PostListener } from './store/index.js';

// Text itself stays out of the log; only its length in code points is recorded.
export function postLogger(logger: Logger): PostListener {
  return (msg) => {
    const textLen = [...msg.text].length;
    logger.info({ id: msg.id, target: msg.channel, sender: msg.sender, text_len: textLen }, 'post_message');
  };
}
