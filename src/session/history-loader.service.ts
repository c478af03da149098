import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  RawTurnRecord,
  TURN_STORE,
  TurnStore,
} from '../storage/interfaces/turn-store.interface';
import { ChatMessageDto, MessageRole } from './dto/chat-message.dto';
import { loadSessionConfig } from './session.config';

const ROLE_MARKERS = new Map<string, MessageRole>([
  ['user', MessageRole.USER],
  ['human', MessageRole.USER],
  ['assistant', MessageRole.ASSISTANT],
  ['ai', MessageRole.ASSISTANT],
]);

const ROLE_ORDER: Record<MessageRole, number> = {
  [MessageRole.USER]: 0,
  [MessageRole.ASSISTANT]: 1,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstString(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

/**
 * Accepts epoch millis, Date, ISO strings and store timestamp objects that
 * expose toMillis().
 */
function toMillis(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? undefined : time;
  }
  if (typeof value === 'string') {
    const time = Date.parse(value);
    return Number.isNaN(time) ? undefined : time;
  }
  if (isRecord(value) && typeof value.toMillis === 'function') {
    const time: unknown = value.toMillis();
    return typeof time === 'number' ? time : undefined;
  }
  return undefined;
}

/**
 * Rebuilds a session's conversation from its turn log.
 *
 * Each stored turn yields its user half then its assistant half. A half whose
 * role marker is unknown or whose content is empty is dropped; a turn with no
 * usable half is skipped. Malformed records never fail the load, but errors
 * from the store itself propagate.
 */
@Injectable()
export class HistoryLoaderService {
  private readonly logger = new Logger(HistoryLoaderService.name);
  private readonly defaultMaxMessages: number;

  constructor(
    @Inject(TURN_STORE) private readonly turnStore: TurnStore,
    @Optional() private readonly configService?: ConfigService,
  ) {
    this.defaultMaxMessages = loadSessionConfig(
      this.configService,
    ).maxHistoryMessages;
  }

  async load(
    userId: string,
    sessionId: string,
    maxMessages: number = this.defaultMaxMessages,
  ): Promise<ChatMessageDto[]> {
    if (maxMessages <= 0) {
      return [];
    }

    const records = await this.turnStore.loadTurns(
      userId,
      sessionId,
      maxMessages,
    );

    const messages: ChatMessageDto[] = [];
    let skipped = 0;

    for (const record of records) {
      const expanded = this.expandTurn(record);
      if (expanded.length === 0) {
        skipped++;
        continue;
      }
      messages.push(...expanded);
    }

    if (skipped > 0) {
      this.logger.debug(
        `Skipped ${skipped} malformed turn record(s) in session ${sessionId.slice(0, 8)}`,
      );
    }

    return messages.length > maxMessages
      ? messages.slice(messages.length - maxMessages)
      : messages;
  }

  expandTurn(record: RawTurnRecord): ChatMessageDto[] {
    if (!isRecord(record) || !Array.isArray(record.messages)) {
      return [];
    }

    const timestamp = toMillis(record.timestamp);
    const halves: ChatMessageDto[] = [];

    for (const half of record.messages) {
      const message = this.parseHalf(half, timestamp);
      if (message) {
        halves.push(message);
      }
    }

    return halves.sort((a, b) => ROLE_ORDER[a.role] - ROLE_ORDER[b.role]);
  }

  private parseHalf(
    half: unknown,
    timestamp: number | undefined,
  ): ChatMessageDto | null {
    if (!isRecord(half)) {
      return null;
    }

    const marker = firstString(half.role, half.type);
    const role = marker ? ROLE_MARKERS.get(marker.toLowerCase()) : undefined;
    const content = firstString(half.content, half.text);

    if (!role || !content || content.trim().length === 0) {
      return null;
    }

    return new ChatMessageDto(role, content, timestamp);
  }
}
