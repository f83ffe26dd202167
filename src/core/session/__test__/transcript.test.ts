import { describe, it, expect } from 'vitest';
import { AgentTranscript } from '../transcript.js';

describe('AgentTranscript', () => {
	it('should record each event with its heading', () => {
		const transcript = new AgentTranscript();

		transcript.add({ type: 'thinking', iteration: 1, content: 'Checking the notebook.' });
		transcript.add({ type: 'tool_prediction', iteration: 1, name: 'read_cell', arguments: { index: 2 } });
		transcript.add({ type: 'tool_result', iteration: 1, name: 'read_cell', result: 'x = 1', isError: false });
		transcript.add({ type: 'error', content: 'Invalid arguments' });

		expect(transcript.toString()).toBe(
			'\n|THINKING|:\nChecking the notebook.\n' +
				'\n|TOOL PREDICTION|:\nTool: `read_cell`\nParameters:\n```json\n{\n  "index": 2\n}\n```\n' +
				'\n|TOOL RESULT|:\nTool: `read_cell`\nResult: x = 1\n' +
				'\n|ERROR|:\nError: Invalid arguments\n'
		);
	});

	it('should write the final response heading once', () => {
		const transcript = new AgentTranscript();

		transcript.add({ type: 'text_chunk', content: 'Cell 2 ' });
		transcript.add({ type: 'text_chunk', content: 'sets x.' });

		expect(transcript.toString()).toBe('\n|FINAL RESPONSE|:\nCell 2 sets x.');
	});

	it('should start empty', () => {
		expect(new AgentTranscript().toString()).toBe('');
	});
});
