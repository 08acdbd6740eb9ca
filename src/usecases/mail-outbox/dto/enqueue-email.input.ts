// src/usecases/mail-outbox/dto/enqueue-email.input.ts

import { ArrayNotEmpty, IsArray, IsEmail, IsNotEmpty, IsString } from 'class-validator';

/**
 * 入箱请求的校验模型
 */
export class EnqueueEmailInput {
  @IsString({ message: '来源消息 ID 必须是字符串' })
  @IsNotEmpty({ message: '来源消息 ID 不能为空' })
  messageId!: string;

  @IsArray({ message: '收件人必须是数组' })
  @ArrayNotEmpty({ message: '收件人列表不能为空' })
  @IsEmail({}, { each: true, message: '收件人地址格式不正确' })
  recipients!: string[];

  @IsString({ message: '邮件主题必须是字符串' })
  subject!: string;

  @IsString({ message: '邮件正文必须是字符串' })
  body!: string;
}
