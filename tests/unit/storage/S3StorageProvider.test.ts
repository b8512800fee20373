import { describe, test, expect, beforeEach, vi } from "vitest";
import { DeleteObjectCommand, HeadObjectCommand, PutObjectCommand } from "@aws-sdk/client-s3";
import { S3StorageProvider } from "../../../core/storage/S3StorageProvider";
import { rejectionCode } from "../helpers";

describe("S3StorageProvider", () => {
    let send: ReturnType<typeof vi.fn>;
    let provider: S3StorageProvider;

    beforeEach(() => {
        send = vi.fn().mockResolvedValue({});
        provider = new S3StorageProvider({ client: { send } });
    });

    test("uploads a public object and returns its URL", async () => {
        const body = Buffer.from("png-bytes");

        const result = await provider.store(body, "media", "/files/my photo.png", { contentType: "image/png" });

        expect(result).toEqual({
            url: "https://media.s3.amazonaws.com/files/my%20photo.png",
            bucket: "media",
            key: "files/my photo.png"
        });
        const command = send.mock.calls[0]?.[0];
        expect(command).toBeInstanceOf(PutObjectCommand);
        expect(command.input).toEqual({
            Bucket: "media",
            Key: "files/my photo.png",
            Body: body,
            ACL: "public-read",
            ContentType: "image/png"
        });
    });

    test("omits the content type when none is given", async () => {
        await provider.store(Buffer.from("x"), "media", "a.bin");

        expect(send.mock.calls[0]?.[0].input.ContentType).toBeUndefined();
    });

    test("wraps client failures in IO_FAILURE", async () => {
        send.mockRejectedValueOnce(new Error("AccessDenied"));

        expect(await rejectionCode(provider.store(Buffer.from("x"), "media", "a.bin"))).toBe("IO_FAILURE");
    });

    test("deletes by the URL it handed out", async () => {
        expect(await provider.delete("media", "https://media.s3.amazonaws.com/files/my%20photo.png")).toBe(true);

        const command = send.mock.calls[0]?.[0];
        expect(command).toBeInstanceOf(DeleteObjectCommand);
        expect(command.input).toEqual({ Bucket: "media", Key: "files/my photo.png" });
    });

    test("delete resolves false when the client fails", async () => {
        send.mockRejectedValueOnce(new Error("boom"));

        expect(await provider.delete("media", "a.bin")).toBe(false);
    });

    test("exists maps NotFound to false", async () => {
        expect(await provider.exists("media", "a.bin")).toBe(true);
        expect(send.mock.calls[0]?.[0]).toBeInstanceOf(HeadObjectCommand);

        send.mockRejectedValueOnce(Object.assign(new Error("missing"), { name: "NotFound" }));
        expect(await provider.exists("media", "a.bin")).toBe(false);

        send.mockRejectedValueOnce(new Error("Forbidden"));
        await expect(provider.exists("media", "a.bin")).rejects.toThrow("Forbidden");
    });
});
