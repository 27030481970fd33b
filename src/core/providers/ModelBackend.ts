/**
 * Model Backend Interface
 *
 * Contract shared by every model service the analyzer can consult
 * (hosted OpenAI, local Ollama, ...).
 */

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ModelBackend {
  /**
   * Send one chat exchange and ask for a JSON object reply
   *
   * @param messages System instruction followed by the user prompt
   * @returns Raw text content of the model reply
   * @throws BackendRequestError on connection failure or non-success status
   */
  complete(messages: ChatMessage[]): Promise<string>;

  /**
   * Get backend name (for logging)
   */
  getBackendName(): string;
}
