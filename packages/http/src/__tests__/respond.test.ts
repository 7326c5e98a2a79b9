import { Errors, Result } from "@faultline/core";
import { HttpConfigSchema } from "../config.js";
import { toProblemDetails } from "../problem.js";
import { sendResult } from "../respond.js";
import { asResponse, createMockResponse } from "./mock-response.js";

describe("toProblemDetails", () => {
  it("should build the problem body from the error", () => {
    expect(toProblemDetails(Errors.notFound("No user 7"), 404)).toEqual({
      type: "https://httpstatuses.io/404",
      title: "NotFoundError",
      status: 404,
      detail: "No user 7",
    });
  });

  it("should use the configured type base", () => {
    const config = HttpConfigSchema.parse({ problemTypeBase: "urn:problem:" });
    expect(toProblemDetails(Errors.conflict("taken"), 409, config).type).toBe(
      "urn:problem:409"
    );
  });
});

describe("sendResult", () => {
  it("should answer 200 with the value", () => {
    const res = createMockResponse();

    sendResult(asResponse(res), Result.success({ id: 7 }));

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ id: 7 });
  });

  it("should answer 201 with a Location header when created", () => {
    const res = createMockResponse();

    sendResult(asResponse(res), Result.success({ id: 7 }), {
      created: "/users/7",
    });

    expect(res.location).toHaveBeenCalledWith("/users/7");
    expect(res.status).toHaveBeenCalledWith(201);
    expect(res.json).toHaveBeenCalledWith({ id: 7 });
  });

  it("should answer 204 for a success without a value", () => {
    const res = createMockResponse();

    sendResult(asResponse(res), Result.ok());

    expect(res.status).toHaveBeenCalledWith(204);
    expect(res.end).toHaveBeenCalled();
    expect(res.json).not.toHaveBeenCalled();
  });

  it("should answer a failure with problem details", () => {
    const res = createMockResponse();

    sendResult(asResponse(res), Result.failure(Errors.conflict("Email taken")));

    expect(res.status).toHaveBeenCalledWith(409);
    expect(res.type).toHaveBeenCalledWith("application/problem+json");
    expect(res.json).toHaveBeenCalledWith({
      type: "https://httpstatuses.io/409",
      title: "ConflictError",
      status: 409,
      detail: "Email taken",
    });
  });

  it("should apply a status override from the config", () => {
    const res = createMockResponse();
    const config = HttpConfigSchema.parse({ statusMap: { ConflictError: 422 } });

    sendResult(asResponse(res), Result.failure(Errors.conflict("Email taken")), {
      config,
    });

    expect(res.status).toHaveBeenCalledWith(422);
  });
});
