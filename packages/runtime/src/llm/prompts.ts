import type { PromptTemplate } from "../types/index.js";

const EXTRACTION_SYSTEM_PROMPT =
  "You are a data extraction tool. Reply with the requested output only, without commentary.";

export const PLANNER_TEMPLATE: PromptTemplate = {
  name: "planner",
  system: [
    "You are an expert planning agent.",
    "Your job is to create a plan that fulfils the user's request using the available agents.",
    "Return a JSON array of steps; every step is an object with the keys agent and action.",
    "Only use the agent names listed by the user message and follow the action format each agent expects.",
    "Later steps may reference earlier results with the placeholders {knowledge_answer} and {search_result}.",
  ].join(" "),
  text: [
    "Available agents:",
    "{agents}",
    "",
    "Example request: \"Announce on the #engineering Slack channel that the new server is deployed.\"",
    "Example output:",
    "[",
    '  { "agent": "Messaging", "action": "Post \\"The new server is deployed.\\" to #engineering" }',
    "]",
    "",
    'User request: "{user_prompt}"',
  ].join("\n"),
};

export const MESSAGING_EXTRACTION_TEMPLATE: PromptTemplate = {
  name: "messaging-extraction",
  system: EXTRACTION_SYSTEM_PROMPT,
  text: [
    "Extract the 'channel' and 'message' from the text.",
    "The channel usually starts with a '#'.",
    'Return a single JSON object: { "channel": string, "message": string }.',
    "",
    'Text: "{action_text}"',
    "",
    "JSON Output:",
  ].join("\n"),
};

export const CALENDAR_EXTRACTION_TEMPLATE: PromptTemplate = {
  name: "calendar-extraction",
  system: EXTRACTION_SYSTEM_PROMPT,
  text: [
    "The text describes a calendar event. Extract the 'title', 'start_time' and 'end_time'.",
    "The current date is {current_date}. Resolve relative times such as \"tomorrow\" or \"next week\" against this date.",
    "Return a single JSON object with the keys title, start_time and end_time in ISO 8601 format (YYYY-MM-DDTHH:MM:SS).",
    "If an end time is not specified, assume the event is one hour long.",
    "",
    'Text: "{action_text}"',
    "",
    "JSON Output:",
  ].join("\n"),
};

export const COMMUNICATION_EXTRACTION_TEMPLATE: PromptTemplate = {
  name: "communication-extraction",
  system: EXTRACTION_SYSTEM_PROMPT,
  text: [
    "Extract the communication task details from the text.",
    "Return a single JSON object with the keys 'type' (\"call\" or \"sms\"),",
    "'recipient' (the phone number in E.164 format) and 'message' (the content to be said or sent).",
    "",
    'Text: "{action_text}"',
    "",
    "JSON Output:",
  ].join("\n"),
};

export const SEARCH_QUERY_TEMPLATE: PromptTemplate = {
  name: "search-query",
  system: EXTRACTION_SYSTEM_PROMPT,
  text: [
    "Extract a concise web search query from the text.",
    "The query should be what a user would type into a search engine.",
    "",
    'Text: "{action_text}"',
    "",
    "Search Query:",
  ].join("\n"),
};

export const KNOWLEDGE_ANSWER_TEMPLATE: PromptTemplate = {
  name: "knowledge-answer",
  text: [
    "Context:",
    "{knowledge}",
    "",
    "Question: {query}",
    "",
    "Answer based only on the context:",
  ].join("\n"),
};
