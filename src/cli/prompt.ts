import * as readline from 'readline';

/**
 * Ask a yes/no question. Anything but y/yes is a no, and so is input that
 * ends before an answer arrives.
 */
export function ask(
	question: string,
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stderr
): Promise<boolean> {
	const rl = readline.createInterface({ input, output });
	return new Promise((resolve) => {
		rl.on('close', () => resolve(false));
		rl.question(`${question} [y/N] `, (answer) => {
			resolve(/^y(es)?$/i.test(answer.trim()));
			rl.close();
		});
	});
}
