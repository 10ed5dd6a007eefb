import { cleanup, render, screen, waitFor } from "@testing-library/react";
import userEvent from "@testing-library/user-event";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { buildFormState, CompanyEditForm, diffCompanyForm } from "@/components/company/company-edit-form";
import { ApiError, deleteCompany, updateCompany } from "@/lib/portfolio/api-client";
import { buildCompany } from "@/test/portfolio-fixtures";

vi.mock("@/lib/portfolio/api-client", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/lib/portfolio/api-client")>();
  return { ...actual, updateCompany: vi.fn(), deleteCompany: vi.fn() };
});

const company = buildCompany({
  id: 10,
  name: "Acme Robotics",
  sector: "Technology",
  revenue_range: "N/A",
  employee_count: "51-100",
});

function renderForm() {
  const handlers = { onSaved: vi.fn(), onDeleted: vi.fn(), onCancel: vi.fn() };
  render(<CompanyEditForm company={company} {...handlers} />);
  return handlers;
}

beforeEach(() => {
  vi.mocked(updateCompany).mockReset();
  vi.mocked(deleteCompany).mockReset();
});

afterEach(() => {
  cleanup();
});

describe("diffCompanyForm", () => {
  it("returns only changed fields and clears blanks to null", () => {
    const state = {
      ...buildFormState(company),
      sector: "  ",
      revenue_range: "$1M - $10M",
      status: "Exit",
      is_public: true,
    };

    expect(diffCompanyForm(company, state)).toEqual({
      sector: null,
      revenue_range: "$1M - $10M",
      status: "Exit",
      is_public: true,
    });
  });

  it("maps N/A ranges to an empty selection", () => {
    expect(buildFormState(company)).toMatchObject({ revenue_range: "", employee_count: "51-100" });
  });
});

describe("CompanyEditForm", () => {
  it("asks for the admin key before saving", async () => {
    const user = userEvent.setup();
    renderForm();

    await user.clear(screen.getByLabelText("Sector"));
    await user.click(screen.getByRole("button", { name: "Save" }));

    expect(screen.getByRole("alert")).toHaveTextContent("Enter the admin key to save changes.");
    expect(updateCompany).not.toHaveBeenCalled();
  });

  it("sends the changed fields with the key", async () => {
    const user = userEvent.setup();
    const saved = { ...company, name: "Acme Robotics Group" };
    vi.mocked(updateCompany).mockResolvedValue(saved);
    const { onSaved } = renderForm();

    await user.clear(screen.getByLabelText("Company name"));
    await user.type(screen.getByLabelText("Company name"), "Acme Robotics Group");
    await user.selectOptions(screen.getByLabelText("Employee count"), "101-250");
    await user.type(screen.getByLabelText("Admin key"), "test-secret");
    await user.click(screen.getByRole("button", { name: "Save" }));

    await waitFor(() => expect(onSaved).toHaveBeenCalledWith(saved));
    expect(updateCompany).toHaveBeenCalledWith(
      10,
      { name: "Acme Robotics Group", employee_count: "101-250" },
      "test-secret",
    );
  });

  it("shows the server error", async () => {
    const user = userEvent.setup();
    vi.mocked(updateCompany).mockRejectedValue(new ApiError("Invalid or missing admin key", 403));
    const { onSaved } = renderForm();

    await user.click(screen.getByLabelText("Public"));
    await user.type(screen.getByLabelText("Admin key"), "wrong");
    await user.click(screen.getByRole("button", { name: "Save" }));

    expect(await screen.findByRole("alert")).toHaveTextContent("Invalid or missing admin key");
    expect(onSaved).not.toHaveBeenCalled();
  });

  it("cancels when nothing changed", async () => {
    const user = userEvent.setup();
    const { onCancel } = renderForm();

    await user.click(screen.getByRole("button", { name: "Save" }));

    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(updateCompany).not.toHaveBeenCalled();
  });

  it("deletes after confirmation", async () => {
    const user = userEvent.setup();
    vi.mocked(deleteCompany).mockResolvedValue({ deleted: true, id: 10 });
    const { onDeleted } = renderForm();

    await user.type(screen.getByLabelText("Admin key"), "test-secret");
    await user.click(screen.getByRole("button", { name: "Delete" }));
    await user.click(screen.getByRole("button", { name: "Confirm delete" }));

    await waitFor(() => expect(onDeleted).toHaveBeenCalledWith(10));
    expect(deleteCompany).toHaveBeenCalledWith(10, "test-secret");
  });
});
