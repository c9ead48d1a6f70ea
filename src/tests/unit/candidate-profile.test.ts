import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { CandidateProfile } from "../../profiles/candidate-profile";
import { CANDIDATE_FIELDS } from "../../shared/types/profile.types";

describe("CandidateProfile", () => {
  it("stores trimmed values and keeps the first write", () => {
    const profile = new CandidateProfile();

    assert.equal(profile.setIfUnset("full_name", "  Jane Doe "), true);
    assert.equal(profile.setIfUnset("full_name", "John Smith"), false);
    assert.equal(profile.get("full_name"), "Jane Doe");
  });

  it("keeps a typo'd email once it has been stored", () => {
    const profile = new CandidateProfile();
    profile.setIfUnset("email", "jane@exmaple.com");

    assert.equal(profile.setIfUnset("email", "jane@example.com"), false);
    assert.equal(profile.get("email"), "jane@exmaple.com");
  });

  it("ignores blank values", () => {
    const profile = new CandidateProfile();

    assert.equal(profile.setIfUnset("email", "   "), false);
    assert.equal(profile.get("email"), null);
    assert.deepEqual(profile.missingFields(), [...CANDIDATE_FIELDS]);
  });

  it("reports completion that never decreases", () => {
    const profile = new CandidateProfile();
    const seen: number[] = [profile.completionPercentage()];
    for (const field of CANDIDATE_FIELDS) {
      profile.setIfUnset(field, `value for ${field}`);
      profile.setIfUnset(field, "overwrite attempt");
      seen.push(profile.completionPercentage());
    }

    assert.deepEqual(seen, [0, 14, 29, 43, 57, 71, 86, 100]);
    assert.equal(profile.isComplete(), true);
    assert.deepEqual(profile.missingFields(), []);
  });

  it("lists missing fields in canonical order", () => {
    const profile = new CandidateProfile();
    profile.setIfUnset("tech_stack", "Go");
    profile.setIfUnset("email", "jane@example.com");

    assert.deepEqual(profile.missingFields(), [
      "full_name",
      "phone",
      "years_of_experience",
      "desired_positions",
      "current_location",
    ]);
    assert.deepEqual(profile.filledFields(), { email: "jane@example.com", tech_stack: "Go" });
  });

  it("renders a summary line per field", () => {
    const profile = new CandidateProfile();
    profile.setIfUnset("full_name", "Jane Doe");

    assert.equal(
      profile.summary(),
      [
        "- Full Name: Jane Doe",
        "- Email Address: pending",
        "- Phone Number: pending",
        "- Years of Experience: pending",
        "- Desired Position(s): pending",
        "- Current Location: pending",
        "- Tech Stack: pending",
      ].join("\n"),
    );
  });

  it("converts to a record with nulls for unset fields", () => {
    const profile = new CandidateProfile();
    profile.setIfUnset("current_location", "Lisbon");

    assert.deepEqual(profile.toRecord(), {
      full_name: null,
      email: null,
      phone: null,
      years_of_experience: null,
      desired_positions: null,
      current_location: "Lisbon",
      tech_stack: null,
    });
  });
});
