import { Injectable, Logger } from '@nestjs/common';

export interface PublishedMessage {
  topic: string;
  message: unknown;
  timestamp: Date;
}

// Stands in for the message broker producer. Keeps everything it was asked to send.
@Injectable()
export class EventProducerService {
  private readonly logger = new Logger(EventProducerService.name);
  private readonly published: PublishedMessage[] = [];

  async publish(topic: string, message: unknown): Promise<void> {
    this.published.push({ topic, message, timestamp: new Date() });
    this.logger.log(`Published message to topic ${topic}`);
  }

  getPublishedMessages(): PublishedMessage[] {
    return [...this.published];
  }
}
