/**
 * Client-side chat state.
 *
 * All transcript changes go through `chatReducer`, so the page renders purely from
 * `ChatState`. The transcript is append-only until "clear", which replaces it with the greeting.
 *
 * `pending` counts requests in flight. Overlapping questions are allowed: each answer (or
 * failure) is appended when it completes and decrements the counter, so answers can land
 * in a different order than their questions were sent.
 */
export type MessageRole = "user" | "assistant";

export interface ChatMessage {
  role: MessageRole;
  content: string;
  // Topic the message was tagged with ("" for none).
  topic: string;
  // ISO-8601.
  timestamp: string;
  isError?: boolean;
}

export interface ChatState {
  messages: ChatMessage[];
  input: string;
  selectedTopic: string;
  pending: number;
}

export type ChatAction =
  | { type: "input/changed"; value: string }
  | { type: "topic/selected"; topic: string }
  | { type: "example/applied"; question: string; topic: string }
  | { type: "question/submitted"; content: string; topic: string; timestamp: string }
  | { type: "answer/received"; answer: string; topic: string; timestamp: string }
  | { type: "answer/failed"; timestamp: string }
  | { type: "transcript/cleared"; timestamp: string };

export const GREETING =
  "👋 Hi! I'm your Cloud Computing study assistant. How can I help you today?";

export const ERROR_REPLY =
  "❌ Sorry, something went wrong while processing your question. Check that the API is running.";

export function greetingMessage(timestamp: string): ChatMessage {
  return { role: "assistant", content: GREETING, topic: "", timestamp };
}

export function createInitialChatState(timestamp: string): ChatState {
  return {
    messages: [greetingMessage(timestamp)],
    input: "",
    selectedTopic: "",
    pending: 0,
  };
}

export function chatReducer(state: ChatState, action: ChatAction): ChatState {
  switch (action.type) {
    case "input/changed":
      return { ...state, input: action.value };

    case "topic/selected":
      return { ...state, selectedTopic: action.topic };

    case "example/applied":
      return { ...state, input: action.question, selectedTopic: action.topic };

    case "question/submitted":
      return {
        ...state,
        messages: [
          ...state.messages,
          {
            role: "user",
            content: action.content,
            topic: action.topic,
            timestamp: action.timestamp,
          },
        ],
        input: "",
        pending: state.pending + 1,
      };

    case "answer/received":
      return {
        ...state,
        messages: [
          ...state.messages,
          {
            role: "assistant",
            content: action.answer,
            topic: action.topic,
            timestamp: action.timestamp,
          },
        ],
        pending: Math.max(0, state.pending - 1),
      };

    case "answer/failed":
      return {
        ...state,
        messages: [
          ...state.messages,
          {
            role: "assistant",
            content: ERROR_REPLY,
            topic: "",
            timestamp: action.timestamp,
            isError: true,
          },
        ],
        pending: Math.max(0, state.pending - 1),
      };

    case "transcript/cleared":
      // In-flight requests are not cancelled; their replies still land here later.
      return {
        ...state,
        messages: [greetingMessage(action.timestamp)],
        selectedTopic: "",
      };
  }
}
