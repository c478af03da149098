import { Session, SessionStatus } from '../interfaces/session.interface';

export class SessionInfoDto {
  sessionId: string;
  status: SessionStatus;
  createdAt: string;
  lastActivityAt: string;
  messageCount: number;

  constructor(session: Session) {
    this.sessionId = session.id;
    this.status = session.status;
    this.createdAt = session.createdAt.toISOString();
    this.lastActivityAt = session.lastActivityAt.toISOString();
    this.messageCount = session.messageCount;
  }
}
