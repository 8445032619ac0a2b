import axios, { AxiosError, AxiosHeaders, AxiosResponse } from "axios";
import { OpenAiChatClientAdapter } from "../../../adapters/openai/openai-chat-client.adapter";
import { RunAssistUseCase } from "../../../application/assist/run-assist.usecase";
import { ResolveModelUseCase } from "../../../application/model-endpoint/resolve-model.usecase";
import { runAssistCommand } from "../../../interaction/cli/commands/assist.command";
import {
  FakeConfig,
  InMemoryDocumentStore,
  createFakeLogger,
  dataFrame,
  readableFrom,
  streamEvent,
} from "../../helpers/fakes";

jest.mock("axios", () => ({
  __esModule: true,
  default: {
    post: jest.fn(),
    isAxiosError: jest.fn(
      (payload: unknown): payload is AxiosError =>
        payload instanceof jest.requireActual("axios").AxiosError,
    ),
  },
  AxiosError: jest.requireActual("axios").AxiosError,
  AxiosHeaders: jest.requireActual("axios").AxiosHeaders,
}));

const mockedAxios = axios as jest.Mocked<typeof axios>;

function axiosResponse<T>(status: number, data: T): AxiosResponse<T> {
  return {
    status,
    statusText: "",
    headers: {},
    config: { headers: new AxiosHeaders() },
    data,
  };
}

describe("F-001 Assist streaming acceptance", () => {
  let writeSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    mockedAxios.post.mockReset();
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
    writeSpy = jest
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("inserts two events from a stream with a keep-alive and a malformed frame", async () => {
    mockedAxios.post.mockResolvedValueOnce(
      axiosResponse(
        200,
        readableFrom([
          dataFrame(streamEvent("Sure, ")),
          ":\n",
          "data: {malformed}\n",
          dataFrame(streamEvent("here it is.")).slice(0, 20),
          dataFrame(streamEvent("here it is.")).slice(20),
        ]),
      ),
    );
    const config = new FakeConfig();
    const logger = createFakeLogger();
    const useCase = new RunAssistUseCase(
      config,
      new ResolveModelUseCase(config),
      new OpenAiChatClientAdapter(config, logger),
      logger,
    );
    const documentStore = new InMemoryDocumentStore({
      "todo.md": "Refactor this:\nlet a = 1",
    });

    await runAssistCommand(
      { filePath: "todo.md", selections: [{ start: 15, end: 24 }] },
      { useCase, documentStore, createInvocationId: () => "assist-f001" },
    );

    expect(documentStore.saved.get("todo.md")).toBe(
      "Refactor this:\nlet a = 1\n\nSure, here it is.\n\n",
    );
    expect(writeSpy.mock.calls).toEqual([["Sure, "], ["here it is."], ["\n"]]);
    expect(logSpy.mock.calls).toEqual([
      ["Generating... (default-model)"],
      ["Done."],
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toMatch(
      /^Failed to decode stream frame: .* \(frame: data: \{malformed\}\)$/,
    );

    const [url, body] = mockedAxios.post.mock.calls[0];
    expect(url).toBe("http://localhost:8080/v1/chat/completions");
    expect(typeof body === "string" ? JSON.parse(body) : body).toMatchObject({
      model: "default-model",
      stream: true,
      messages: [
        { role: "system" },
        { role: "user", content: "Refactor this:\n->->let a = 1<-<-" },
      ],
    });
  });
});
