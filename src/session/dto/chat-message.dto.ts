export enum MessageRole {
  USER = 'user',
  ASSISTANT = 'assistant',
}

export class ChatMessageDto {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp?: number;

  constructor(role: MessageRole, content: string, timestamp?: number) {
    this.role = role;
    this.content = content;
    this.timestamp = timestamp;
  }
}
