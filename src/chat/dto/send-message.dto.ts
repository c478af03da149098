import { IsNotEmpty, IsOptional, IsString, IsUUID } from 'class-validator';

// Length is checked by ChatService against the configured limit, after trimming.
export class SendMessageDto {
  @IsString()
  @IsNotEmpty()
  message!: string;

  @IsOptional()
  @IsUUID('4')
  sessionId?: string;
}
