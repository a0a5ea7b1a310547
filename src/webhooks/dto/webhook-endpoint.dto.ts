import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  MaxLength,
} from 'class-validator';
import { WEBHOOK_EVENT_NAMES, WebhookEventName } from '../webhook-events';

const URL_OPTIONS = { protocols: ['http', 'https'], require_protocol: true, require_tld: false };

export class CreateWebhookEndpointDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name!: string;

  @IsUrl(URL_OPTIONS)
  @MaxLength(500)
  url!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsIn(WEBHOOK_EVENT_NAMES, { each: true })
  events!: WebhookEventName[];

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class UpdateWebhookEndpointDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name?: string;

  @IsOptional()
  @IsUrl(URL_OPTIONS)
  @MaxLength(500)
  url?: string;

  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsIn(WEBHOOK_EVENT_NAMES, { each: true })
  events?: WebhookEventName[];

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class TestWebhookEndpointDto {
  @IsOptional()
  @IsIn(WEBHOOK_EVENT_NAMES)
  event?: WebhookEventName;
}
