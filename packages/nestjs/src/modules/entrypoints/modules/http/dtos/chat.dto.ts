import { IsOptional, IsString, MaxLength } from "class-validator";

export class ChatRequestDto {
  /**
   * Blank or missing messages are rejected by the conversation service
   */
  @IsOptional()
  @IsString()
  @MaxLength(5000)
  message?: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  sessionId?: string;
}

export interface ChatResponseDto {
  response: string;
  sentiment: string;
  confidence: number;
  sessionId: string;
  timestamp: string;
}
