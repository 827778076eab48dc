export interface Message {
  readonly id: number;
  readonly channel: string;
  readonly sender: string;
  readonly text: string;
  readonly createdAt: number; // epoch ms
}

// Shape served to pollers and the browser page
export interface WireMessage {
  id: number;
  sender: string;
  text: string;
  created_at: number;
}

export function toWireMessage(msg: Message): WireMessage {
  return { id: msg.id, sender: msg.sender, text: msg.text, created_at: msg.createdAt };
}
