export interface RoomMetadata {
  call_id: string;
  trunk_id: string;
  caller_id: string;
  callee_id: string;
  rule_id: string;
  agent_profile: string;
  [key: string]: string;
}

/** Room server commands. A resolved promise is the acknowledgment. */
export interface RoomService {
  createRoom(roomName: string, metadata: RoomMetadata): Promise<void>;
  closeRoom(roomName: string): Promise<void>;
}
