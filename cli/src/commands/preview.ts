/**
 * Preview Command
 *
 * Shows how a message would appear on the display, frame by frame,
 * without waiting between frames.
 */

import { showMessage } from '../../../engine/display/renderer.js';
import { ConsoleDisplayDriver } from '../../../engine/display/drivers/console-driver.js';
import { RecordingDisplayDriver } from '../../../engine/display/drivers/recording-driver.js';

interface PreviewOptions {
  format: string;
}

export async function previewMessage(message: string, options: PreviewOptions): Promise<void> {
  // Literal "\n" typed on the command line counts as a line break
  const text = message.replace(/\\n/g, '\n');

  if (options.format === 'json') {
    const recorder = new RecordingDisplayDriver();
    const presentation = await showMessage(recorder, text, { frameDelayMs: 0 });
    console.log(JSON.stringify({ presentation, frames: recorder.frames }, null, 2));
    return;
  }

  await showMessage(new ConsoleDisplayDriver(), text, { frameDelayMs: 0 });
}
