export interface WireMessage {
  id: number;
  sender: string;
  text: string;
  created_at: number;
}

export interface MessagesPage {
  target: string;
  messages: WireMessage[];
  latest_id: number;
}
