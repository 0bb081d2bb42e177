import { describe, expect, it } from "vitest";
import {
  buildGatewayUrl,
  decodeEnvelope,
  encodeHeartbeat,
  encodeIdentify,
  GatewayError,
  GatewayOpcode,
  readHelloInterval
} from "../index.js";

describe("gateway codec", () => {
  it("decodes a dispatch envelope", () => {
    const envelope = decodeEnvelope('{"op":0,"s":3,"t":"MESSAGE_CREATE","d":{"id":"1"}}');
    expect(envelope).toEqual({
      op: 0,
      sequence: 3,
      eventName: "MESSAGE_CREATE",
      data: { id: "1" }
    });
  });

  it("treats missing and null sequence and name as absent", () => {
    expect(decodeEnvelope('{"op":11}')).toEqual({ op: 11, sequence: null, eventName: null, data: undefined });
    expect(decodeEnvelope('{"op":1,"s":null,"t":null,"d":null}')).toEqual({
      op: 1,
      sequence: null,
      eventName: null,
      data: null
    });
  });

  it("ignores a non-integer sequence", () => {
    expect(decodeEnvelope('{"op":0,"s":2.5,"t":"X","d":{}}').sequence).toBeNull();
  });

  it("rejects frames that are not JSON or lack an opcode", () => {
    expect(() => decodeEnvelope("not json")).toThrowError(GatewayError);
    try {
      decodeEnvelope('{"s":1}');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GatewayError);
      if (error instanceof GatewayError) {
        expect(error.code).toBe("protocol_error");
        expect(error.message).toBe("Gateway frame has an unexpected shape (op: Required)");
      }
    }
  });

  it("reads the heartbeat interval from Hello only", () => {
    expect(readHelloInterval(decodeEnvelope('{"op":10,"d":{"heartbeat_interval":41250}}'))).toBe(41250);
    expect(() => readHelloInterval(decodeEnvelope('{"op":11,"d":null}'))).toThrowError("Wrong opcode: 11");
    expect(() => readHelloInterval(decodeEnvelope('{"op":10,"d":{}}'))).toThrowError(
      "Hello payload is missing a positive heartbeat_interval"
    );
  });

  it("encodes heartbeat with explicit null when no sequence was seen", () => {
    expect(encodeHeartbeat(null)).toBe('{"op":1,"d":null}');
    expect(encodeHeartbeat(42)).toBe('{"op":1,"d":42}');
  });

  it("encodes identify with token, intents and properties", () => {
    const frame = encodeIdentify({
      token: "test-secret",
      intents: 513,
      properties: { os: "linux", browser: "gatewire", device: "gatewire" }
    });
    expect(frame).toBe(
      '{"op":2,"d":{"token":"test-secret","intents":513,"properties":{"os":"linux","browser":"gatewire","device":"gatewire"}}}'
    );
  });

  it("builds the connection URL", () => {
    expect(buildGatewayUrl("wss://gateway.test/", 10)).toBe("wss://gateway.test?v=10&encoding=json");
    expect(GatewayOpcode.InvalidSession).toBe(9);
  });
});
