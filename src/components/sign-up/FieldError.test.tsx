import { describe, it, expect } from "vitest";
import { render, screen } from "@testing-library/react";
import { FieldError } from "./FieldError";

describe("FieldError", () => {
  it("renders nothing without an error", () => {
    render(<FieldError id="email-error" />);
    expect(screen.queryByRole("alert")).not.toBeInTheDocument();
  });

  it("renders nothing for an error without a message", () => {
    render(<FieldError id="email-error" error={{}} />);
    expect(screen.queryByRole("alert")).not.toBeInTheDocument();
  });

  it("renders the message as an alert tied to its id", () => {
    render(<FieldError id="password-error" error={{ message: "Password must contain a number" }} />);

    const alert = screen.getByRole("alert");
    expect(alert).toHaveTextContent("Password must contain a number");
    expect(alert).toHaveAttribute("id", "password-error");
  });
});
