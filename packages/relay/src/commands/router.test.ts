import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { createSilentLogger, type CameraDescriptor, type MediaArtifact } from "@camrelay/shared";
import type { CaptureAdapter } from "../capture.js";
import { CameraSession } from "../session.js";
import { RecordingNotifier, cameraFixture } from "../test-fixtures.js";
import { CommandRouter, parseChatCommand } from "./router.js";

// captures never finish, so an accepted trigger keeps the camera busy
const stalledCapture: CaptureAdapter = {
  capture: () => new Promise<MediaArtifact>(() => {})
};

function sessionFor(overrides: Partial<CameraDescriptor>): CameraSession {
  return new CameraSession({
    camera: cameraFixture(overrides),
    capture: stalledCapture,
    notifier: new RecordingNotifier(),
    logger: createSilentLogger(),
    serviceName: "camrelay"
  });
}

function router(...cameras: Partial<CameraDescriptor>[]): CommandRouter {
  return new CommandRouter("house", cameras.map(sessionFor), createSilentLogger());
}

describe("parseChatCommand", () => {
  it("accepts slash, bot-suffixed and bare forms", () => {
    assert.equal(parseChatCommand("/grabimage"), "grabimage");
    assert.equal(parseChatCommand("/grabvideo@HouseCamBot"), "grabvideo");
    assert.equal(parseChatCommand(" GrabImage "), "grabimage");
    assert.equal(parseChatCommand("/status"), undefined);
  });
});

describe("CommandRouter", () => {
  it("only addresses cameras bound to its bot", () => {
    const routed = router({ name: "porch" }, { name: "yard", bot: "ops" });
    assert.deepEqual(routed.cameraNames, ["porch"]);
    assert.deepEqual(routed.dispatch("grabimage", "yard"), {
      ok: false,
      text: 'Unknown camera "yard". Available: porch'
    });
  });

  it("defaults to the only camera when none is named", () => {
    assert.deepEqual(router({ name: "porch" }).dispatch("grabimage", ""), {
      ok: true,
      text: "Capturing an image from porch..."
    });
  });

  it("asks for a camera name when several are bound", () => {
    assert.deepEqual(router({ name: "porch" }, { name: "garage" }).dispatch("grabvideo", "  "), {
      ok: false,
      text: "Name a camera: /grabvideo <camera>. Available: porch, garage"
    });
  });

  it("matches camera names case-insensitively", () => {
    assert.deepEqual(router({ name: "porch", videoSeconds: 8 }, { name: "garage" }).dispatch("grabvideo", "PORCH"), {
      ok: true,
      text: "Recording 8s of video from porch..."
    });
  });

  it("reports a busy camera", () => {
    const routed = router({ name: "porch" });
    routed.dispatch("grabimage", "porch");
    assert.deepEqual(routed.dispatch("grabimage", "porch"), {
      ok: false,
      text: "porch is busy with another capture, try again shortly."
    });
  });

  it("explains alert-only cameras", () => {
    assert.deepEqual(router({ name: "gate", nomedia: true }).dispatch("grabimage", "gate"), {
      ok: true,
      text: "gate is in alert-only mode, sending a text alert."
    });
  });

  it("refuses during shutdown", () => {
    const session = sessionFor({ name: "porch" });
    session.stop();
    const routed = new CommandRouter("house", [session], createSilentLogger());
    assert.deepEqual(routed.dispatch("grabimage", ""), {
      ok: false,
      text: "The relay is shutting down, try again later."
    });
  });

  it("lists no cameras for a bot without any", () => {
    assert.deepEqual(new CommandRouter("house", [], createSilentLogger()).dispatch("grabimage", "porch"), {
      ok: false,
      text: 'Unknown camera "porch". Available: none'
    });
  });
});
