import { RoomServiceClient } from 'livekit-server-sdk';
import { env } from '../env';
import { isLiveKitNotFound } from '../livekit/errors';
import { log } from '../log';
import type { RoomMetadata, RoomService } from './types';

/** The RoomServiceClient calls this adapter makes. */
export interface LiveKitRoomApi {
  createRoom(options: { name: string; emptyTimeout?: number; metadata?: string }): Promise<unknown>;
  deleteRoom(room: string): Promise<void>;
}

export interface LiveKitRoomServiceOptions {
  api?: LiveKitRoomApi;
  emptyTimeoutSeconds?: number;
}

export class LiveKitRoomService implements RoomService {
  private readonly api: LiveKitRoomApi;
  private readonly emptyTimeoutSeconds: number;

  constructor(options: LiveKitRoomServiceOptions = {}) {
    this.api = options.api ?? new RoomServiceClient(env.LIVEKIT_URL, env.LIVEKIT_API_KEY, env.LIVEKIT_API_SECRET);
    this.emptyTimeoutSeconds = options.emptyTimeoutSeconds ?? env.LIVEKIT_ROOM_EMPTY_TIMEOUT_S;
  }

  public async createRoom(roomName: string, metadata: RoomMetadata): Promise<void> {
    const startedAt = Date.now();
    await this.api.createRoom({
      name: roomName,
      emptyTimeout: this.emptyTimeoutSeconds,
      metadata: JSON.stringify(metadata),
    });
    log.info(
      { event: 'livekit_room_created', room_name: roomName, call_id: metadata.call_id, duration_ms: Date.now() - startedAt },
      'livekit room created',
    );
  }

  /** Closing a room that no longer exists counts as closed. */
  public async closeRoom(roomName: string): Promise<void> {
    try {
      await this.api.deleteRoom(roomName);
    } catch (error) {
      if (!isLiveKitNotFound(error)) {
        throw error;
      }
      log.debug({ event: 'livekit_room_already_gone', room_name: roomName }, 'livekit room already gone');
      return;
    }
    log.info({ event: 'livekit_room_closed', room_name: roomName }, 'livekit room closed');
  }
}
