import { Test, TestingModule } from "@nestjs/testing";
import { appConfig } from "../src/config/app.config";
import { FfmpegCommandBuilder } from "../src/transcode/ffmpeg-command.builder";

describe("FfmpegCommandBuilder", () => {
  let builder: FfmpegCommandBuilder;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FfmpegCommandBuilder,
        {
          provide: appConfig.KEY,
          useValue: {
            ffmpegPath: "/opt/ffmpeg/bin/ffmpeg",
            logLevel: "log",
            tempPrefix: "cover-tagger-test-",
          },
        },
      ],
    }).compile();

    builder = module.get<FfmpegCommandBuilder>(FfmpegCommandBuilder);
  });

  describe("build", () => {
    it("should attach a cover and apply tags", () => {
      const command = builder.build({
        input: "/in/01.mp3",
        output: "/out/01.mp3",
        tags: [
          { key: "title", value: "First" },
          { key: "track", value: "1" },
        ],
        cover: "/art/cover.png",
        overwrite: true,
      });

      expect(command).toEqual({
        command: "/opt/ffmpeg/bin/ffmpeg",
        args: [
          "-hide_banner",
          "-y",
          "-i",
          "/in/01.mp3",
          "-i",
          "/art/cover.png",
          "-map",
          "0:a",
          "-map",
          "1",
          "-c",
          "copy",
          "-disposition:v:0",
          "attached_pic",
          "-map_metadata",
          "0",
          "-metadata",
          "title=First",
          "-metadata",
          "track=1",
          "/out/01.mp3",
        ],
      });
    });

    it("should keep audio only and refuse to overwrite without a cover", () => {
      const command = builder.build({
        input: "/in/01.flac",
        output: "/out/01.flac",
        tags: [],
        overwrite: false,
      });

      expect(command.args).toEqual([
        "-hide_banner",
        "-n",
        "-i",
        "/in/01.flac",
        "-map",
        "0:a",
        "-c",
        "copy",
        "-map_metadata",
        "0",
        "/out/01.flac",
      ]);
    });

    it.each(["/out/a.m4a", "/out/a.MP4", "/out/a.mov"])(
      "should request metadata tags for %s",
      (output) => {
        const { args } = builder.build({
          input: "/in/a.m4a",
          output,
          tags: [],
          overwrite: false,
        });

        expect(args.slice(-3)).toEqual(["-movflags", "use_metadata_tags", output]);
      },
    );
  });

  describe("toShellString", () => {
    it("should join plain arguments with spaces", () => {
      expect(
        builder.toShellString({
          command: "ffmpeg",
          args: ["-hide_banner", "-y", "-i", "/in/a.mp3", "/out/a.mp3"],
        }),
      ).toBe("ffmpeg -hide_banner -y -i /in/a.mp3 /out/a.mp3");
    });

    it("should quote arguments containing spaces", () => {
      expect(
        builder.toShellString({
          command: "ffmpeg",
          args: ["-i", "/in/My Song.mp3"],
        }),
      ).toBe("ffmpeg -i '/in/My Song.mp3'");
    });
  });
});
