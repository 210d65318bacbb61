"use client";

import { useEffect, useReducer, useRef, useState } from "react";
import type { FormEvent } from "react";
import type { Topic } from "@cloud-study/shared-types/contracts";
import { askQuestion, checkHealth, loadTopics } from "../lib/relay_client";
import { chatReducer, createInitialChatState } from "../lib/transcript";
import type { ApiStatus } from "../lib/relay_client";

/**
 * Study assistant chat page.
 *
 * - Transcript, input and selected topic live in one reducer (`lib/transcript.ts`).
 * - Liveness and topic list are fetched once on mount; neither blocks typing.
 * - Questions are not serialized: a new one can be sent while earlier ones are pending.
 * - All calls go to the Next.js `/api/*` proxy routes, never to the relay directly.
 */
const EXAMPLE_QUESTIONS: { question: string; topic: string }[] = [
  { question: "What is Docker?", topic: "Docker and Containers" },
  { question: "How does ECS Fargate work?", topic: "AWS Core Services" },
  { question: "Explain CI/CD", topic: "CI/CD and GitHub Actions" },
  { question: "What is Kubernetes?", topic: "Kubernetes" },
];

const STATUS_LABELS: Record<ApiStatus, string> = {
  checking: "Checking...",
  connected: "Connected",
  offline: "Offline",
};

function formatTime(timestamp: string): string {
  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) return "";
  return date.toLocaleTimeString("en-US", { hour: "2-digit", minute: "2-digit" });
}

export default function HomePage() {
  const [state, dispatch] = useReducer(chatReducer, undefined, () =>
    createInitialChatState(new Date().toISOString())
  );
  const [topics, setTopics] = useState<Topic[]>([]);
  const [apiStatus, setApiStatus] = useState<ApiStatus>("checking");
  const messagesRef = useRef<HTMLDivElement | null>(null);

  useEffect(() => {
    let active = true;
    // Neither call rejects: failures resolve to "offline" and the fallback topic list.
    void checkHealth().then((status) => {
      if (active) setApiStatus(status);
    });
    void loadTopics().then((list) => {
      if (active) setTopics(list);
    });
    return () => {
      active = false;
    };
  }, []);

  useEffect(() => {
    const container = messagesRef.current;
    if (container) {
      container.scrollTop = container.scrollHeight;
    }
  }, [state.messages]);

  const sendQuestion = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    const question = state.input;
    if (!question.trim()) return;
    const topic = state.selectedTopic;

    dispatch({
      type: "question/submitted",
      content: question,
      topic,
      timestamp: new Date().toISOString(),
    });

    try {
      const response = await askQuestion({ question, topic });
      dispatch({
        type: "answer/received",
        answer: response.answer,
        topic: response.topic,
        timestamp: response.timestamp,
      });
    } catch {
      dispatch({ type: "answer/failed", timestamp: new Date().toISOString() });
    }
  };

  const askExample = (question: string, topic: string) => {
    dispatch({ type: "example/applied", question, topic });
  };

  const clearChat = () => {
    dispatch({ type: "transcript/cleared", timestamp: new Date().toISOString() });
  };

  const selectTopic = (topic: string) => {
    dispatch({ type: "topic/selected", topic });
  };

  return (
    <main>
      <header className="panel brand">
        <div>
          <h1>Study Assistant</h1>
          <p className="helper">Cloud Computing &amp; DevOps</p>
        </div>
        <div className="header-actions">
          <span className={`status ${apiStatus}`} data-testid="api-status">
            {STATUS_LABELS[apiStatus]}
          </span>
          <button className="button secondary" type="button" onClick={clearChat}>
            Clear
          </button>
        </div>
      </header>

      <section className="panel topics">
        <h3>Available Topics</h3>
        <div className="toggle-group" role="group" aria-label="Select topic">
          <button
            type="button"
            className={`toggle-button ${state.selectedTopic === "" ? "active" : ""}`}
            aria-pressed={state.selectedTopic === ""}
            onClick={() => selectTopic("")}
          >
            General
          </button>
          {topics.map((topic) => (
            <button
              key={topic.id}
              type="button"
              title={topic.description}
              className={`toggle-button ${state.selectedTopic === topic.name ? "active" : ""}`}
              aria-pressed={state.selectedTopic === topic.name}
              onClick={() => selectTopic(topic.name)}
            >
              {topic.name}
            </button>
          ))}
        </div>
      </section>

      <div className="layout">
        <aside className="panel examples">
          <h3>Example Questions</h3>
          {EXAMPLE_QUESTIONS.map((example) => (
            <button
              key={example.question}
              type="button"
              className="prompt-chip"
              onClick={() => askExample(example.question, example.topic)}
            >
              <span className="example-question">{example.question}</span>
              <span className="example-topic">{example.topic}</span>
            </button>
          ))}
          <p className="helper">Pick a topic for more focused answers.</p>
        </aside>

        <section className="panel chat-area">
          <div className="messages" aria-live="polite" ref={messagesRef}>
            {state.messages.map((message, index) => (
              <div
                key={index}
                className={`message ${message.role}${message.isError ? " error" : ""}`}
              >
                {message.role === "user" && message.topic ? (
                  <div className="message-topic">{message.topic}</div>
                ) : null}
                <p className="message-content">{message.content}</p>
                <span className="message-time">{formatTime(message.timestamp)}</span>
              </div>
            ))}
            {state.pending > 0 ? (
              <div className="typing-indicator" aria-label="Assistant is typing">
                ...
              </div>
            ) : null}
          </div>

          <form className="form" onSubmit={sendQuestion}>
            <input
              type="text"
              value={state.input}
              onChange={(event) => dispatch({ type: "input/changed", value: event.target.value })}
              placeholder="Ask a question about Cloud Computing..."
              aria-label="Your question"
            />
            <button className="button" type="submit" disabled={!state.input.trim()}>
              Send
            </button>
          </form>

          {state.selectedTopic ? (
            <p className="helper selected-topic">
              Topic: <strong>{state.selectedTopic}</strong>
              <button
                type="button"
                className="link-button"
                aria-label="Clear topic"
                onClick={() => selectTopic("")}
              >
                ✕
              </button>
            </p>
          ) : null}
        </section>
      </div>
    </main>
  );
}
