import type { AgentEvent } from '../brain/reasoning/events.js';

/**
 * Plain-text record of one agent turn, kept in the conversation history so
 * later chat turns can refer to what the agent did.
 */
export class AgentTranscript {
	private text = '';
	private finalStarted = false;

	add(event: AgentEvent): void {
		switch (event.type) {
			case 'thinking':
				this.text += `\n|THINKING|:\n${event.content}\n`;
				break;
			case 'tool_prediction':
				this.text +=
					`\n|TOOL PREDICTION|:\nTool: \`${event.name}\`\n` +
					`Parameters:\n\`\`\`json\n${JSON.stringify(event.arguments, null, 2)}\n\`\`\`\n`;
				break;
			case 'tool_result':
				this.text += `\n|TOOL RESULT|:\nTool: \`${event.name}\`\nResult: ${event.result}\n`;
				break;
			case 'error':
				this.text += `\n|ERROR|:\nError: ${event.content}\n`;
				break;
			case 'text_chunk':
				if (!this.finalStarted) {
					this.text += '\n|FINAL RESPONSE|:\n';
					this.finalStarted = true;
				}
				this.text += event.content;
				break;
		}
	}

	toString(): string {
		return this.text;
	}
}
