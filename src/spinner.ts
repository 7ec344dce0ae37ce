import ora from 'ora';

/**
 * Run a task under a spinner. The spinner is marked failed, not left
 * running, when the task throws; the error is rethrown.
 */
export async function withSpinner<T>(text: string, task: () => Promise<T>): Promise<T> {
  const spinner = ora(text).start();
  try {
    const result = await task();
    spinner.stop();
    return result;
  } catch (error) {
    spinner.fail(error instanceof Error ? error.message : String(error));
    throw error;
  }
}
