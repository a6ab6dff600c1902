export interface HttpResponse {
  readonly ok: boolean;
  readonly status: number;
}

/** Minimal transport the dispatcher needs: one form-encoded POST. */
export interface HttpClient {
  postForm(url: string, form: Record<string, string>): Promise<HttpResponse>;
}

/** HttpClient over the global fetch. Response bodies are drained and discarded. */
export class FetchHttpClient implements HttpClient {
  async postForm(url: string, form: Record<string, string>): Promise<HttpResponse> {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams(form),
    });
    await response.arrayBuffer();
    return { ok: response.ok, status: response.status };
  }
}
