// ============================================================
// Server Entry Point
// ============================================================
// `npm run dev` / `npm start` run this file. It:
//
//   1. Loads .env (MUST be first: config reads process.env)
//   2. Parses configuration; GEMINI_API_KEY is mandatory
//   3. Builds the tools that are configured:
//        PINECONE_API_KEY → rag_tool
//        BRAVE_API_KEY    → medical_web_search
//        (disease_prediction needs nothing)
//   4. Picks the history store (MongoDB if MONGODB_URI is set)
//   5. Builds the agent + chat service + Express app
//   6. Starts listening
// ============================================================

import dotenv from "dotenv";
dotenv.config();

import { createApp } from "./app";
import connectDB from "./config/db";
import { AppConfig, loadConfig, parseAllowedOrigins, requireSetting } from "./config/env";
import { LLM_PROVIDER_NAME, getGeminiClient } from "./config/gemini";
import { getPineconeClient } from "./config/pinecone";
import { MedicalAgent } from "./modules/agent/agent.service";
import { GeminiChatModel } from "./modules/agent/llm.service";
import { ChatService } from "./modules/chat/chat.service";
import {
  ConversationStore,
  InMemoryConversationStore,
  MongoConversationStore,
} from "./modules/chat/conversation.store";
import { PineconeRetriever } from "./modules/knowledge/retriever.service";
import { BraveSearchClient } from "./modules/search/webSearch.service";
import { createMedicalTools } from "./modules/tools";
import { createGeminiEmbedder } from "./utils/embeddings";
import { getErrorMessage } from "./utils/errors";

const createStore = async (config: AppConfig): Promise<ConversationStore> => {
  if (!config.MONGODB_URI) {
    console.warn("[Store] MONGODB_URI not set, conversation history is kept in memory");
    return new InMemoryConversationStore();
  }
  await connectDB(config.MONGODB_URI);
  return new MongoConversationStore();
};

const startServer = async () => {
  const config = loadConfig();
  const ai = getGeminiClient(requireSetting(config, "GEMINI_API_KEY"));

  const retriever = config.PINECONE_API_KEY
    ? new PineconeRetriever(
        getPineconeClient(config.PINECONE_API_KEY),
        createGeminiEmbedder(ai, {
          model: config.EMBEDDING_MODEL,
          dimensions: config.EMBEDDING_DIMENSIONS,
        }),
        { indexName: config.PINECONE_INDEX_NAME, namespace: config.PINECONE_NAMESPACE }
      )
    : undefined;
  if (!retriever) console.warn("[Tools] PINECONE_API_KEY not set, knowledge base search disabled");

  const webSearch = config.BRAVE_API_KEY ? new BraveSearchClient(config.BRAVE_API_KEY) : undefined;
  if (!webSearch) console.warn("[Tools] BRAVE_API_KEY not set, web search disabled");

  const agent = new MedicalAgent({
    model: new GeminiChatModel(ai, {
      model: config.CHAT_MODEL,
      temperature: config.LLM_TEMPERATURE,
      maxOutputTokens: config.LLM_MAX_TOKENS,
    }),
    tools: createMedicalTools({ retriever, webSearch }),
    maxSteps: config.AGENT_MAX_STEPS,
  });

  const store = await createStore(config);
  const chatService = new ChatService({
    agent,
    store,
    historyTurns: config.HISTORY_TURNS,
    historyLimit: config.HISTORY_LIMIT,
  });

  const app = createApp({
    chatService,
    allowedOrigins: parseAllowedOrigins(config.ALLOWED_ORIGINS),
    healthServices: () => ({
      agent: "✅ Online",
      tools: agent.toolNames.join(", "),
      environment:
        config.GEMINI_API_KEY && config.PINECONE_API_KEY ? "✅ Configured" : "❌ Missing Keys",
      api: "✅ Online",
      llm_provider: `${LLM_PROVIDER_NAME} (${config.CHAT_MODEL})`,
      storage: chatService.storageBackend,
    }),
  });

  app.listen(config.PORT, () => {
    console.log(`
    ╔══════════════════════════════════════════╗
    ║   Medical Assistant API                  ║
    ║   Running on: http://localhost:${config.PORT}      ║
    ║   Environment: ${config.NODE_ENV}
    ║   AI Provider: ${LLM_PROVIDER_NAME}
    ╚══════════════════════════════════════════╝
    `);
  });
};

startServer().catch((error) => {
  console.error(`[API] Failed to start: ${getErrorMessage(error)}`);
  process.exit(1);
});
