import {
  WebSocketGateway,
  WebSocketServer,
  OnGatewayConnection,
  OnGatewayDisconnect,
  OnGatewayInit,
  SubscribeMessage,
  MessageBody,
  ConnectedSocket,
} from '@nestjs/websockets';
import { Logger } from '@nestjs/common';
import { Server, Socket } from 'socket.io';
import { RatingSubscriptionSchema, RatingSummary, RatingUpdateEvent } from '@playlist-api/shared';

export const RATING_UPDATE_EVENT = 'rating:update';

// The gateway only broadcasts to rooms and moves sockets between them
export type RoomBroadcaster = Pick<Server, 'to'>;
export type RoomMember = Pick<Socket, 'id' | 'join' | 'leave'>;

export function songRoom(songId: string): string {
  return `song:${songId}`;
}

@WebSocketGateway({
  cors: {
    origin: process.env.CORS_ORIGIN || '*',
  },
  namespace: '/ratings',
})
export class RatingsGateway implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect {
  @WebSocketServer()
  server!: RoomBroadcaster;

  private readonly logger = new Logger(RatingsGateway.name);

  afterInit() {
    this.logger.log('Ratings WebSocket gateway initialized');
  }

  handleConnection(client: Socket) {
    this.logger.debug(`Client connected: ${client.id}`);
  }

  handleDisconnect(client: Socket) {
    this.logger.debug(`Client disconnected: ${client.id}`);
  }

  @SubscribeMessage('subscribe')
  async handleSubscribe(@ConnectedSocket() client: RoomMember, @MessageBody() body: unknown) {
    const parsed = RatingSubscriptionSchema.safeParse(body);
    if (!parsed.success) {
      return { event: 'error', data: { message: 'songId is required' } };
    }

    await client.join(songRoom(parsed.data.songId));
    return { event: 'subscribed', data: { songId: parsed.data.songId } };
  }

  @SubscribeMessage('unsubscribe')
  async handleUnsubscribe(@ConnectedSocket() client: RoomMember, @MessageBody() body: unknown) {
    const parsed = RatingSubscriptionSchema.safeParse(body);
    if (!parsed.success) {
      return { event: 'error', data: { message: 'songId is required' } };
    }

    await client.leave(songRoom(parsed.data.songId));
    return { event: 'unsubscribed', data: { songId: parsed.data.songId } };
  }

  @SubscribeMessage('ping')
  handlePing() {
    return { event: 'pong', data: { timestamp: Date.now() } };
  }

  /** Pushes a committed rating summary to every subscriber of the song. */
  broadcastRatingUpdate(summary: RatingSummary): void {
    const event: RatingUpdateEvent = {
      ...summary,
      updatedAt: new Date().toISOString(),
    };

    try {
      this.server.to(songRoom(summary.song_id)).emit(RATING_UPDATE_EVENT, event);
    } catch (error) {
      // The rating is already committed; a failed push only loses the notification
      this.logger.error(
        `Failed to broadcast rating update for song ${summary.song_id}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
