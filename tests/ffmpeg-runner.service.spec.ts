import { Logger } from "@nestjs/common";
import { ChildProcess, spawn } from "child_process";
import { EventEmitter } from "events";
import { FfmpegRunnerService } from "../src/transcode/ffmpeg-runner.service";
import {
  TranscodeFailedError,
  TranscoderUnavailableError,
} from "../src/transcode/transcode.errors";

jest.mock("child_process", () => ({
  spawn: jest.fn(),
}));

class FakeChildProcess extends EventEmitter {
  readonly stderr = new EventEmitter();
}

describe("FfmpegRunnerService", () => {
  const spawnMock = jest.mocked(spawn);
  let service: FfmpegRunnerService;
  let child: FakeChildProcess;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, "error").mockImplementation(() => undefined);
    child = new FakeChildProcess();
    spawnMock.mockReset();
    spawnMock.mockReturnValue(child as unknown as ChildProcess);
    service = new FfmpegRunnerService();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should resolve when ffmpeg exits cleanly", async () => {
    const run = service.run({ command: "ffmpeg", args: ["-i", "a.mp3", "b.mp3"] });
    child.emit("close", 0);

    await expect(run).resolves.toBeUndefined();
    expect(spawnMock).toHaveBeenCalledWith("ffmpeg", ["-i", "a.mp3", "b.mp3"], {
      stdio: ["ignore", "ignore", "pipe"],
    });
  });

  it("should reject with the exit code and stderr on failure", async () => {
    const run = service.run({ command: "ffmpeg", args: [] });
    child.stderr.emit("data", Buffer.from("Invalid data "));
    child.stderr.emit("data", Buffer.from("found"));
    child.emit("close", 1);

    const error = await run.catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscodeFailedError);
    expect(error).toMatchObject({
      message: "ffmpeg exited with code 1",
      exitCode: 1,
      stderr: "Invalid data found",
    });
  });

  it("should keep only the tail of a long stderr", async () => {
    const run = service.run({ command: "ffmpeg", args: [] });
    child.stderr.emit("data", Buffer.from("a".repeat(3000)));
    child.stderr.emit("data", Buffer.from("b".repeat(3000)));
    child.emit("close", 1);

    const error = await run.catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscodeFailedError);
    expect(error).toMatchObject({ stderr: "a".repeat(1000) + "b".repeat(3000) });
  });

  it("should reject with TranscoderUnavailableError when ffmpeg cannot start", async () => {
    const run = service.run({ command: "ffmpeg", args: [] });
    child.emit("error", new Error("spawn ffmpeg ENOENT"));

    await expect(run).rejects.toThrow(TranscoderUnavailableError);
    await expect(run).rejects.toThrow("Failed to start 'ffmpeg': spawn ffmpeg ENOENT");
  });
});
